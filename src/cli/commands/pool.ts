import type { Command } from 'commander';
import chalk from 'chalk';
import { getContext } from '../context.js';
import { printTable, printJson, printInfo, isJsonOutput, formatTime, healthBar, yesNo } from '../output.js';

export function registerPoolCommand(program: Command): void {
  program
    .command('pool')
    .description('Connect every active account and show pool health')
    .action(async () => {
      const ctx = await getContext();
      const init = await ctx.pool.initialize(await ctx.store.loadWorkerConfigs());
      const summary = ctx.pool.healthSummary();
      const statuses = ctx.pool.listStatuses();
      await ctx.pool.shutdown();

      if (isJsonOutput()) {
        printJson({ initialized: init.initializedCount, failures: init.failures, summary, workers: statuses });
        return;
      }

      printInfo(
        `${summary.connected}/${summary.active} connected, ${summary.total} total  ${healthBar(summary.healthPct)}`,
      );
      printTable(
        ['Id', 'Active', 'Connected', 'Load', 'Processed', 'Errors', 'Last Used', 'Cooldown Until', 'Last Error'],
        statuses.map(s => [
          s.label === s.id ? s.id : `${s.id} (${s.label})`,
          yesNo(s.isActive),
          yesNo(s.isConnected),
          `${s.currentLoad}/${s.maxConcurrent}`,
          String(s.messagesProcessed),
          String(s.errorCount),
          formatTime(s.lastUsed),
          s.nextAvailable ? chalk.yellow(formatTime(s.nextAvailable)) : '-',
          s.lastError ? chalk.red(s.lastError) : '-',
        ]),
      );
    });
}
