import type { Command, OptionValues } from 'commander';
import { booleanOption, printJson, requireProject, stringOption } from '../cli-shared.js';
import { runWorker } from '../../worker/worker.js';

export function registerWorkCommand(program: Command): void {
  program
    .command('work')
    .description('Claim and run at most one queued job')
    .option('--queue-dir <path>', 'Queue directory (default: queue.dir)')
    .option('--dry-run', 'Peek at the next job without claiming it', false)
    .action(async (opts: OptionValues, cmd: Command) => {
      const { root, settings } = requireProject(cmd);
      const outcome = await runWorker({
        root,
        settings,
        queueDir: stringOption(opts, 'queueDir'),
        dryRun: booleanOption(opts, 'dryRun'),
      });

      if (outcome === null) {
        console.log('Worker skipped: PIPELINE_ENABLED=false');
        return;
      }
      printJson({ summary_path: outcome.summaryPath, ...outcome.summary });
      if (outcome.summary.decision === 'failed') process.exit(1);
    });
}
