import type { Command, OptionValues } from 'commander';
import { integerOption, requireProject, stringOption } from '../cli-shared.js';
import { startServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the operator API that hosts the process supervisor')
    .option('--host <host>', 'Bind host (default: api.host, 127.0.0.1)')
    .option('--port <port>', 'Port (default: api.port, 7800)')
    .action(async (opts: OptionValues, cmd: Command) => {
      const { root, settings } = requireProject(cmd);
      const host = stringOption(opts, 'host') ?? settings.api.host;
      const port = integerOption(opts, 'port') ?? settings.api.port;

      console.log('Starting reelforge operator API...');
      console.log(`  API: http://${host}:${port}/v1`);
      console.log('\nPress Ctrl+C to stop\n');

      await startServer({ root, settings, host, port });
    });
}
