import type { Command, OptionValues } from 'commander';
import { booleanOption, printJson, requireProject, stringOption } from '../cli-shared.js';
import { runPipeline } from '../../runtime/runner.js';
import { StepFailedError, errorMessage } from '../../shared/errors.js';
import { defaultRunId } from '../../shared/ids.js';

function parseParams(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error('Invalid JSON in --params. Example: --params \'{"topic":"night markets"}\'');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--params must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a pipeline plan against output/<run-id>/')
    .requiredOption('--pipeline <path>', 'Pipeline YAML, relative to the project root')
    .option('--run-id <id>', 'Run id (default: run_<unix seconds>)')
    .option('--params <json>', 'JSON object exposed to steps as run params')
    .option('--json', 'Print the run summary as JSON', false)
    .action(async (opts: OptionValues, cmd: Command) => {
      const { root, settings } = requireProject(cmd);
      const pipeline = stringOption(opts, 'pipeline') ?? '';
      const runId = stringOption(opts, 'runId') ?? defaultRunId();

      try {
        const summary = await runPipeline(pipeline, runId, {
          root,
          settings,
          params: parseParams(stringOption(opts, 'params')),
        });
        if (booleanOption(opts, 'json')) {
          printJson(summary);
          return;
        }
        console.log(`Run ${summary.run_id}: ${summary.status}`);
        for (const step of summary.results) {
          console.log(`  [${step.status}] ${step.id} (${step.handler_key})${step.output ? ` -> ${step.output}` : ''}`);
        }
        if (summary.planned_paths?.length) {
          console.log('\nPlanned (dry run, nothing written):');
          summary.planned_paths.forEach((p) => console.log(`  ${p}`));
        }
      } catch (err) {
        if (err instanceof StepFailedError) {
          console.error(`Run failed at step ${err.stepId}: ${err.cause?.message ?? err.message}`);
        } else {
          console.error(`Run failed: ${errorMessage(err)}`);
        }
        process.exit(1);
      }
    });
}
