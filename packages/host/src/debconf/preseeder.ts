import type { ExecFn, Preseeder } from '../types.js';

/** Formats one `debconf-set-selections` line */
export function formatSelection(
  pkg: string,
  question: string,
  vtype: string,
  value: string,
): string {
  return `${pkg} ${question} ${vtype} ${value}\n`;
}

/**
 * Answers installer questions ahead of time through `debconf-set-selections`.
 * The selection is fed on stdin so passwords never show up in the process table.
 */
export function createDebconfPreseeder(exec: ExecFn): Preseeder {
  return {
    async setAnswer(pkg, question, value, vtype) {
      await exec('debconf-set-selections', [], {
        input: formatSelection(pkg, question, vtype, value),
      });
    },
  };
}
