import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printJson, printTable, isJsonOutput, formatTime } from '../output.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('Show recently handled messages')
    .option('-n, --limit <n>', 'number of entries', '20')
    .action(async (opts: { limit: string }) => {
      const ctx = await getContext();
      const limit = Math.max(1, Number.parseInt(opts.limit, 10) || 20);
      const outcomes = await ctx.store.recentOutcomes(limit);

      if (isJsonOutput()) {
        printJson(outcomes);
        return;
      }

      printTable(
        ['Time', 'Item', 'Status', 'Worker', 'Attempts', 'Score', 'Tags', 'Error'],
        outcomes.map(o => [
          formatTime(o.recordedAt),
          o.workItemId,
          o.status,
          o.workerId ?? '-',
          String(o.attempts),
          String(o.score),
          o.tags.join(',') || '-',
          o.error ?? '-',
        ]),
      );
    });
}
