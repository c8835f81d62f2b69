export type PrivacyStatus = 'private' | 'unlisted' | 'public';

export interface UploadSettings {
  enabled: boolean;
  maxRetries: number;
  backoffSeconds: number;
  privacyStatus: PrivacyStatus;
  timeoutMs: number;
  credentials: {
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
  };
}

/**
 * Every kill-switch and timing parameter, read once per invocation and
 * passed by value to the subsystems that need it.
 */
export interface Settings {
  pipelineEnabled: boolean;
  schedulerEnabled: boolean;
  workerEnabled: boolean;
  upload: UploadSettings;
  probe: {
    bin: string;
    timeoutMs: number;
  };
  scheduler: {
    timezone: string;
    windowMinutes: number;
    planPath: string;
  };
  queueDir: string;
  supervisor: {
    commandsPath: string;
    logDir: string;
  };
  api: {
    host: string;
    port: number;
  };
}

export interface ProjectPaths {
  root: string;              // project root (absolute)
  configFile: string;        // reelforge.config.yaml
  outputDir: string;         // output/
  schedulerArtifacts: string; // output/scheduler/artifacts/
  workerArtifacts: string;   // output/worker/artifacts/
}
