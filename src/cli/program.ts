import { Command } from 'commander';
import { setJsonOutput } from './output.js';
import { registerAccountsCommand } from './commands/accounts.js';
import { registerPoolCommand } from './commands/pool.js';
import { registerClassifyCommand } from './commands/classify.js';
import { registerRunCommand } from './commands/run.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerSendersCommand } from './commands/senders.js';
import { registerStatsCommand } from './commands/stats.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('switchyard')
    .description('Round-robin account pool for rate-limited messaging workers')
    .version('0.1.0')
    .option('--json', 'output in JSON format')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.json) {
        setJsonOutput(true);
      }
    });

  registerAccountsCommand(program);
  registerPoolCommand(program);
  registerClassifyCommand(program);
  registerRunCommand(program);
  registerHistoryCommand(program);
  registerSendersCommand(program);
  registerStatsCommand(program);

  return program;
}

export async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
