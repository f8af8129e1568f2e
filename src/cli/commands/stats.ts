import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printJson, printTable, printInfo, isJsonOutput } from '../output.js';
import { summarizeOutcomes } from '../../analytics/service-stats.js';
import { MAX_OUTCOMES } from '../../store/json-store.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Per-service totals over the outcome history')
    .option('-d, --days <n>', 'only outcomes from the last n days', '30')
    .action(async (opts: { days: string }) => {
      const ctx = await getContext();
      const windowDays = Math.max(1, Number.parseInt(opts.days, 10) || 30);
      const summary = summarizeOutcomes(await ctx.store.recentOutcomes(MAX_OUTCOMES), { windowDays });

      if (isJsonOutput()) {
        printJson(summary);
        return;
      }

      const { byStatus } = summary;
      printInfo(
        `${summary.total} messages in ${windowDays}d: ${byStatus.succeeded} delivered, ${byStatus.failed} failed, ` +
        `${byStatus['no-capacity']} no capacity, ${byStatus.ignored} ignored, ${byStatus.blocked} blocked ` +
        `(${summary.perMinute}/min now)`,
      );
      printTable(
        ['Service', 'Total', 'Delivered', 'Avg Score', 'Peak Hours (UTC)'],
        summary.services.map(s => [
          s.tag,
          String(s.total),
          String(s.delivered),
          s.averageScore.toFixed(2),
          s.peakHours.map(h => `${String(h).padStart(2, '0')}:00`).join(', ') || '-',
        ]),
      );
    });
}
