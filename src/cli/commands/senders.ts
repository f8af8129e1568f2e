import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printTable, printJson, printSuccess, printError, isJsonOutput, formatTime } from '../output.js';

export function registerSendersCommand(program: Command): void {
  const senders = program
    .command('senders')
    .description('Block or allow message senders');

  senders
    .command('list', { isDefault: true })
    .description('List blocked and allowed senders')
    .action(async () => {
      const ctx = await getContext();
      const listings = await ctx.store.listSenders();

      if (isJsonOutput()) {
        printJson(listings);
        return;
      }

      printTable(
        ['Sender', 'Status', 'Reason', 'Updated'],
        listings.map(l => [l.senderId, l.status, l.reason ?? '-', formatTime(l.updatedAt)]),
      );
    });

  senders
    .command('block <senderId>')
    .description('Drop every message from a sender')
    .option('-r, --reason <reason>', 'why the sender is blocked', 'Admin decision')
    .action(async (senderId: string, opts: { reason: string }) => {
      const ctx = await getContext();
      await ctx.store.setSenderStatus(senderId, 'blocked', opts.reason);
      printSuccess(`Sender ${senderId} blocked: ${opts.reason}`);
    });

  senders
    .command('allow <senderId>')
    .description('Allow a sender, lifting any block')
    .action(async (senderId: string) => {
      const ctx = await getContext();
      await ctx.store.setSenderStatus(senderId, 'allowed');
      printSuccess(`Sender ${senderId} allowed`);
    });

  senders
    .command('clear <senderId>')
    .description('Remove a sender from both lists')
    .action(async (senderId: string) => {
      const ctx = await getContext();
      if (await ctx.store.clearSenderStatus(senderId)) {
        printSuccess(`Sender ${senderId} cleared`);
      } else {
        printError(`Sender ${senderId} is not listed`);
        process.exitCode = 1;
      }
    });
}
