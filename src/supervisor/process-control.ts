import type { ChildProcess } from 'node:child_process';

/**
 * Platform capability for signalling a supervised child. On POSIX the child
 * leads its own process group, so signals reach every descendant.
 */
export interface ProcessControl {
  readonly supportsSuspend: boolean;
  /** Whether children should be spawned as process-group leaders. */
  readonly detached: boolean;
  suspend(child: ChildProcess): void;
  resume(child: ChildProcess): void;
  terminate(child: ChildProcess): void;
}

export type KillFn = (pid: number, signal: NodeJS.Signals) => void;

const defaultKill: KillFn = (pid, signal) => {
  process.kill(pid, signal);
};

function groupPid(child: ChildProcess): number {
  if (child.pid === undefined) throw new Error('child has no pid');
  return -child.pid;
}

export class PosixProcessControl implements ProcessControl {
  readonly supportsSuspend = true;
  readonly detached = true;

  constructor(private readonly kill: KillFn = defaultKill) {}

  suspend(child: ChildProcess): void {
    this.kill(groupPid(child), 'SIGSTOP');
  }

  resume(child: ChildProcess): void {
    this.kill(groupPid(child), 'SIGCONT');
  }

  terminate(child: ChildProcess): void {
    const pid = groupPid(child);
    this.kill(pid, 'SIGTERM');
    // a stopped group only acts on SIGTERM once continued
    this.kill(pid, 'SIGCONT');
  }
}

export class WindowsProcessControl implements ProcessControl {
  readonly supportsSuspend = false;
  readonly detached = false;

  suspend(): void {
    throw new Error('suspend is not supported on this platform');
  }

  resume(): void {
    throw new Error('resume is not supported on this platform');
  }

  terminate(child: ChildProcess): void {
    child.kill();
  }
}

export function defaultProcessControl(platform: NodeJS.Platform = process.platform): ProcessControl {
  return platform === 'win32' ? new WindowsProcessControl() : new PosixProcessControl();
}
