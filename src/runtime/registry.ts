import { FfprobeProber, type ArtifactProber } from '../gates/probe.js';
import type { VideoUploader } from '../gates/publish-gate.js';
import { YouTubeUploader } from '../connector/youtube/uploader.js';
import { UnknownHandlerError } from '../shared/errors.js';
import type { Settings } from '../workspace/types.js';
import { artifactWrite } from './handlers/artifact-write.js';
import { createQualityGateHandler } from './handlers/quality-gate.js';
import { createYouTubeUploadHandler } from './handlers/youtube-upload.js';
import type { StepHandler } from './types.js';

export const HANDLER_KEYS = ['artifact.write', 'quality.gate', 'youtube.upload'] as const;

export type HandlerKey = (typeof HANDLER_KEYS)[number];

export interface HandlerServices {
  prober?: (settings: Settings) => ArtifactProber;
  uploader?: (settings: Settings) => VideoUploader;
  sleep?: (ms: number) => Promise<void>;
}

export class StepRegistry {
  private readonly handlers: ReadonlyMap<string, StepHandler>;

  constructor(handlers: Readonly<Record<string, StepHandler>>) {
    this.handlers = new Map(Object.entries(handlers));
  }

  has(key: string): boolean {
    return this.handlers.has(key);
  }

  keys(): string[] {
    return [...this.handlers.keys()].sort();
  }

  resolve(key: string, stepId = '(unknown)'): StepHandler {
    const handler = this.handlers.get(key);
    if (!handler) throw new UnknownHandlerError(key, stepId);
    return handler;
  }
}

export function builtinHandlers(services: HandlerServices = {}): Record<HandlerKey, StepHandler> {
  const prober =
    services.prober ?? ((settings: Settings) => new FfprobeProber({ bin: settings.probe.bin, timeoutMs: settings.probe.timeoutMs }));
  const uploader = services.uploader ?? ((settings: Settings) => new YouTubeUploader({ settings: settings.upload }));
  return {
    'artifact.write': artifactWrite,
    'quality.gate': createQualityGateHandler(prober),
    'youtube.upload': createYouTubeUploadHandler(uploader, services.sleep),
  };
}

export function createDefaultRegistry(services: HandlerServices = {}): StepRegistry {
  return new StepRegistry(builtinHandlers(services));
}
