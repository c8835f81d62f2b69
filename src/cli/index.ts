#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '../shared/errors.js';
import { parseLogLevel, setLogLevel } from '../shared/logger.js';
import { registerRunCommand } from './commands/run.js';
import { registerScheduleCommand } from './commands/schedule.js';
import { registerWorkCommand } from './commands/work.js';
import { registerQueueCommand } from './commands/queue.js';
import { registerServeCommand } from './commands/serve.js';
import { registerDoctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('reelforge')
  .description('reelforge – scheduled content pipelines with validation and publish gates')
  .version('0.1.0')
  .option('--root <dir>', 'Project root (default: current directory)')
  .option('--log-level <level>', 'debug | info | warn | error (default: LOG_LEVEL or info)')
  .hook('preAction', (cmd) => {
    const level: unknown = cmd.opts()['logLevel'];
    if (typeof level === 'string') setLogLevel(parseLogLevel(level));
  });

registerRunCommand(program);
registerScheduleCommand(program);
registerWorkCommand(program);
registerQueueCommand(program);
registerServeCommand(program);
registerDoctorCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
