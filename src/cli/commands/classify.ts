import type { Command } from 'commander';
import { getContext } from '../context.js';
import { printJson, printTable, isJsonOutput } from '../output.js';

export function registerClassifyCommand(program: Command): void {
  program
    .command('classify <text...>')
    .description('Score a message the way the intake would')
    .action(async (words: string[]) => {
      const ctx = await getContext();
      const analysis = ctx.classifier.analyze(words.join(' '));
      const dispatchable = analysis.isWork && analysis.score >= ctx.config.classifier.threshold;

      if (isJsonOutput()) {
        printJson({ ...analysis, dispatchable });
        return;
      }

      printTable(['Field', 'Value'], [
        ['work', String(analysis.isWork)],
        ['score', `${analysis.score} (threshold ${ctx.config.classifier.threshold})`],
        ['tags', analysis.tags.join(', ') || '-'],
        ['urgency', String(analysis.urgency)],
        ['language', analysis.language],
        ['dispatch', dispatchable ? 'yes' : 'no'],
      ]);
    });
}
