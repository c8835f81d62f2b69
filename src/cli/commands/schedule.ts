import type { Command, OptionValues } from 'commander';
import { booleanOption, integerOption, printJson, requireProject, stringOption } from '../cli-shared.js';
import { runSchedule } from '../../scheduler/run-schedule.js';
import { parseIsoInZone } from '../../scheduler/timezone.js';

export function registerScheduleCommand(program: Command): void {
  program
    .command('schedule')
    .description('Enqueue schedule plan entries that fall inside the window')
    .option('--plan <path>', 'Schedule plan YAML (default: scheduler.plan_path)')
    .option('--now <iso>', 'Evaluate as if the current time were <iso> (UTC unless an offset is given)')
    .option('--window-minutes <n>', 'Look-ahead window in minutes')
    .option('--queue-dir <path>', 'Queue directory (default: queue.dir)')
    .option('--dry-run', 'Report what would be enqueued without writing to the queue', false)
    .action(async (opts: OptionValues, cmd: Command) => {
      const { root, settings } = requireProject(cmd);
      const nowRaw = stringOption(opts, 'now');
      // Without an offset, --now is UTC wall time regardless of the host zone.
      const now = nowRaw === undefined ? undefined : parseIsoInZone(nowRaw, 'UTC');
      if (now === null) {
        throw new Error(`--now is not a valid date-time: ${nowRaw}`);
      }

      const outcome = await runSchedule({
        root,
        settings,
        planPath: stringOption(opts, 'plan'),
        queueDir: stringOption(opts, 'queueDir'),
        now,
        windowMinutes: integerOption(opts, 'windowMinutes'),
        dryRun: booleanOption(opts, 'dryRun'),
      });

      if (outcome.status === 'disabled') {
        console.log('Scheduler skipped: PIPELINE_ENABLED=false');
        return;
      }
      printJson({ summary_path: outcome.summaryPath, ...outcome.summary });
    });
}
