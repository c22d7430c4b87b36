/**
 * Human-readable reports for failed and aborted runs.
 */

import type { AbortedResult, FailResult } from './result.js';

export { formatValue } from './data/show.js';

function indent(text: string): string[] {
  return text.split('\n').map((line) => `  ${line}`);
}

/**
 * Format a failing result for display.
 */
export function formatFailure<C, R>(result: FailResult<C, R>): string {
  const { counterexample, originalFailure, stats } = result;
  const lines = ['Stateful property failed:'];

  lines.push('');
  lines.push(
    `Counterexample (${counterexample.sequence.length} commands, after ${stats.shrinkSteps} shrinks):`
  );
  lines.push(...indent(counterexample.sequence.toString()));

  lines.push('');
  lines.push('Error:');
  lines.push(...indent(counterexample.error.message));

  if (result.shrinkError !== null) {
    lines.push('');
    lines.push('Shrinking stopped early:');
    lines.push(...indent(result.shrinkError.message));
  }

  if (stats.shrinkSteps > 0) {
    const original = originalFailure.error;
    const changed =
      original.kind !== counterexample.error.kind ||
      original.message !== counterexample.error.message;

    lines.push('');
    lines.push(`Original failure (${originalFailure.sequence.length} commands):`);
    lines.push(...indent(original.message));
    if (changed) {
      lines.push('');
      lines.push('Note: the counterexample fails differently from the original sequence.');
    }
    lines.push(
      'Note: shrunk sequences replay the remaining commands without checking that the model still offers them.'
    );
  }

  lines.push('');
  lines.push('Reproduce with:');
  lines.push(`  seed: ${result.seed}`);
  lines.push(`  trial: ${result.trial} (${result.trialSeed.toString()}, size ${result.size.get()})`);

  if (stats.testsRun > 0) {
    lines.push('');
    lines.push(`Passed ${stats.testsRun} tests before failing`);
  }

  return lines.join('\n');
}

/**
 * Format an aborted result for display.
 */
export function formatAborted(result: AbortedResult): string {
  const lines = ['Stateful property aborted:'];
  lines.push('');
  lines.push(result.error.message);
  lines.push('');
  lines.push(`Tests run: ${result.stats.testsRun}`);
  lines.push(`Seed: ${result.seed}`);
  return lines.join('\n');
}
