import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printTable, printJson, printSuccess, printError, isJsonOutput, formatTime, yesNo } from '../output.js';
import type { WorkerConfig } from '../../workers/handle.js';

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return n;
}

export function registerAccountsCommand(program: Command): void {
  const accounts = program
    .command('accounts')
    .description('Manage worker accounts');

  accounts
    .command('list', { isDefault: true })
    .description('List stored accounts')
    .action(async () => {
      const ctx = await getContext();
      const workers = await ctx.store.listWorkers();

      if (isJsonOutput()) {
        printJson(workers.map(w => ({
          id: w.id,
          label: w.label,
          binding: w.binding,
          isActive: w.isActive,
          messagesProcessed: w.messagesProcessed,
          errorCount: w.errorCount,
          lastUsed: w.lastUsed,
          createdAt: w.createdAt,
        })));
        return;
      }

      printTable(
        ['Id', 'Label', 'Binding', 'Active', 'Processed', 'Errors', 'Last Used'],
        workers.map(w => [
          w.id,
          w.label ?? '-',
          w.binding ?? 'http',
          yesNo(w.isActive),
          String(w.messagesProcessed),
          String(w.errorCount),
          formatTime(w.lastUsed),
        ]),
      );
    });

  accounts
    .command('add <id>')
    .description('Connect a new account and store it')
    .requiredOption('-t, --token <token>', 'access token for the messaging service')
    .option('-l, --label <label>', 'display name')
    .option('-b, --binding <binding>', 'handle binding', 'http')
    .option('-c, --max-concurrent <n>', 'reservations this account may hold at once', parsePositiveInt)
    .action(async (id: string, opts: { token: string; label?: string; binding: string; maxConcurrent?: number }) => {
      const ctx = await getContext();
      const config: WorkerConfig = {
        id,
        binding: opts.binding,
        credentials: { token: opts.token },
        label: opts.label,
        maxConcurrent: opts.maxConcurrent,
      };

      await ctx.store.saveWorkerConfig(config);
      const result = await ctx.pool.add(config);
      await ctx.pool.shutdown();

      if (result.ok) {
        printSuccess(`Account ${id} connected and saved`);
        return;
      }
      await ctx.store.deactivateWorker(id);
      printError(`Account ${id} could not connect: ${result.error.message}`);
      process.exitCode = 1;
    });

  accounts
    .command('remove <id>')
    .description('Deactivate a stored account')
    .action(async (id: string) => {
      const ctx = await getContext();
      if (await ctx.store.deactivateWorker(id)) {
        printSuccess(`Account ${id} deactivated`);
      } else {
        printError(`No account ${id}`);
        process.exitCode = 1;
      }
    });
}
