import type { Command } from 'commander';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { getContext } from '../context.js';
import { printError, printJson, printTable, isJsonOutput } from '../output.js';
import type { InboundMessage } from '../../scheduler/intake.js';
import { logger } from '../../utils/logger.js';

const idSchema = z.union([z.string(), z.number()]).transform(String);

const inboundLineSchema = z.object({
  text: z.string(),
  chatId: idSchema.optional(),
  messageId: idSchema.optional(),
  senderId: idSchema.optional(),
});

/** A stdin line is either plain text or a JSON object with a text field and optional source ids */
export function parseInboundLine(line: string): InboundMessage | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  if (!trimmed.startsWith('{')) return { text: trimmed };

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return { text: trimmed };
  }
  const parsed = inboundLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Read messages from stdin, one per line, and dispatch the ones that read as work')
    .option('-c, --concurrency <n>', 'messages handled at once', '4')
    .action(async (opts: { concurrency: string }) => {
      const ctx = await getContext();
      const concurrency = Math.max(1, Number.parseInt(opts.concurrency, 10) || 4);

      const init = await ctx.pool.initialize(await ctx.store.loadWorkerConfigs());
      if (!init.ok) {
        await ctx.pool.shutdown();
        printError('No account could connect; add one with `switchyard accounts add`');
        process.exitCode = 1;
        return;
      }

      const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
      let stopping = false;
      const onSignal = (): void => {
        stopping = true;
        rl.close();
      };
      process.once('SIGINT', onSignal);

      const inFlight = new Set<Promise<void>>();
      try {
        for await (const line of rl) {
          if (stopping) break;
          const message = parseInboundLine(line);
          if (!message) {
            logger.warn('Skipping unreadable input line');
            continue;
          }

          if (inFlight.size >= concurrency) {
            await Promise.race(inFlight);
          }
          const task: Promise<void> = ctx.intake.handle(message)
            .then(result => {
              if (result.dispatch?.status === 'no-capacity') {
                logger.warn(`Work item ${result.workItemId} dropped: no capacity`);
              }
            })
            .catch((err: unknown) => {
              logger.error(`Intake failed: ${err instanceof Error ? err.message : String(err)}`);
            })
            .finally(() => {
              inFlight.delete(task);
            });
          inFlight.add(task);
        }
        await Promise.all(inFlight);
      } finally {
        process.off('SIGINT', onSignal);
        await ctx.pool.shutdown();
      }

      const counters = ctx.intake.getCounters();
      if (isJsonOutput()) {
        printJson(counters);
        return;
      }
      printTable(
        ['Received', 'Blocked', 'Matched', 'Delivered', 'Failed', 'No Capacity'],
        [[
          String(counters.received),
          String(counters.blocked),
          String(counters.matched),
          String(counters.dispatched),
          String(counters.failed),
          String(counters.noCapacity),
        ]],
      );
    });
}
