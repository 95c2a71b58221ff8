import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { configCommand } from './commands/config.js';
import { setGlobalLogLevel } from './lib/logger.js';

export const cli = new Command();

cli
  .name('accbi')
  .description('APS token lifecycle CLI for the ACC to Power BI pipeline')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', 'Output format: json (default) | table', 'json')
  .option('-q, --quiet', 'Only log errors')
  .option('-v, --verbose', 'Log debug details');

cli.hook('preAction', (thisCommand) => {
  const { quiet, verbose } = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();
  if (verbose) {
    setGlobalLogLevel('debug');
  } else if (quiet) {
    setGlobalLogLevel('error');
  }
});

// 註冊指令
cli.addCommand(authCommand);
cli.addCommand(configCommand);
