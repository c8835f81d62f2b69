import type { FileQueue } from '../queue/file-queue.js';
import type { ProcessSupervisor } from '../supervisor/supervisor.js';
import type { Settings } from '../workspace/types.js';

export interface RouteOpts {
  supervisor: ProcessSupervisor;
  queue: FileQueue;
  settings: Settings;
}
