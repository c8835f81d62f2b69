/**
 * Default `VideoUploader`: resumable upload to the YouTube Data API.
 */
import type { Blob } from 'node:buffer';
import { openAsBlob } from 'node:fs';
import { z } from 'zod';
import { UploadApiError, errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import type { UploadSettings } from '../../workspace/types.js';
import { watchUrl, type UploadRequest, type UploadResult, type VideoUploader } from '../../gates/publish-gate.js';
import { refreshYouTubeToken, requireCredentials, type FetchFn } from './auth.js';

const UPLOAD_URI =
  'https://www.googleapis.com/upload/youtube/v3/videos?uploadType=resumable&part=snippet,status';

const VideoResourceSchema = z.object({ id: z.string().min(1) }).passthrough();

export interface YouTubeUploaderOptions {
  settings: UploadSettings;
  fetch?: FetchFn;
  /** Reads the file to send; defaults to `fs.openAsBlob`. */
  openFile?: (absPath: string) => Promise<Blob>;
}

export class YouTubeUploader implements VideoUploader {
  private readonly settings: UploadSettings;
  private readonly http: FetchFn;
  private readonly openFile: (absPath: string) => Promise<Blob>;

  constructor(opts: YouTubeUploaderOptions) {
    this.settings = opts.settings;
    this.http = opts.fetch ?? fetch;
    this.openFile = opts.openFile ?? ((absPath) => openAsBlob(absPath));
  }

  async upload(req: UploadRequest): Promise<UploadResult> {
    const credentials = requireCredentials(this.settings.credentials);
    const timeoutMs = this.settings.timeoutMs;
    const token = await refreshYouTubeToken(credentials, { fetch: this.http, timeoutMs });

    const init = await this.send('YouTube upload initiation', UPLOAD_URI, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token.access_token}`,
        'Content-Type': 'application/json; charset=UTF-8',
        'X-Upload-Content-Type': 'video/*',
      },
      body: JSON.stringify({
        snippet: {
          title: req.title,
          description: req.description,
          tags: req.tags,
        },
        status: { privacyStatus: req.privacyStatus },
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    const uploadUri = init.headers.get('Location');
    if (!uploadUri) throw new UploadApiError('No upload URI returned by YouTube');

    const body = await this.openFile(req.filePath);
    const uploaded = await this.send('YouTube video upload', uploadUri, {
      method: 'PUT',
      headers: {
        Authorization: `Bearer ${token.access_token}`,
        'Content-Type': 'video/*',
      },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });

    const parsed = VideoResourceSchema.safeParse(await uploaded.json());
    if (!parsed.success) {
      throw new UploadApiError('YouTube upload response did not include a video id');
    }
    logger.info('YouTube upload complete', { video_id: parsed.data.id });
    return { videoId: parsed.data.id, url: watchUrl(parsed.data.id) };
  }

  private async send(label: string, url: string, init: RequestInit): Promise<Response> {
    let resp: Response;
    try {
      resp = await this.http(url, init);
    } catch (err) {
      throw new UploadApiError(`${label} failed: ${errorMessage(err)}`);
    }
    if (!resp.ok) {
      throw new UploadApiError(`${label} failed: ${resp.status}`, resp.status);
    }
    return resp;
  }
}
