import { isAbsolute, resolve } from 'node:path';
import type { Command, OptionValues } from 'commander';
import { requireProject, stringOption } from '../cli-shared.js';
import { FileQueue } from '../../queue/file-queue.js';

export function registerQueueCommand(program: Command): void {
  const queue = program.command('queue').description('Inspect the job queue');

  queue
    .command('list')
    .description('List pending jobs in FIFO order')
    .option('--queue-dir <path>', 'Queue directory (default: queue.dir)')
    .action(async (opts: OptionValues, cmd: Command) => {
      const { root, settings } = requireProject(cmd);
      const dir = stringOption(opts, 'queueDir') ?? settings.queueDir;
      const pending = await new FileQueue(isAbsolute(dir) ? dir : resolve(root, dir)).listPending();
      if (pending.length === 0) {
        console.log('No pending jobs.');
        return;
      }
      pending.forEach((name) => console.log(name));
    });
}
