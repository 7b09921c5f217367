/**
 * Argument parsing and report formatting for the CLI
 */

import type { DepthReport } from '../services/audit.js';

export function parseArgs(args: string[]): { command: string | undefined; options: Record<string, string | boolean> } {
  const options: Record<string, string | boolean> = {};
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      const key = args[i].slice(2);
      const nextArg = args[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith('--')) {
        options[key] = nextArg;
        i++;
      } else {
        options[key] = true;
      }
    }
  }
  return { command: args[0], options };
}

/** The lines printed for a depth report */
export function formatDepthReport(report: DepthReport): string {
  switch (report.status) {
    case 'found':
      return [
        `nonce=${report.nonce}`,
        `  mined_in_block_index=${report.blockIndex}`,
        `  head_index=${report.headIndex}`,
        `  confirmations=${report.confirmations}`,
      ].join('\n');
    case 'not_found':
      return `nonce=${report.nonce} not found in mined blocks (may still be queued/expired)`;
    case 'indeterminate':
      return `nonce=${report.nonce} not found in blocks ${report.oldestIndex}..${report.headIndex}; ` +
        `older blocks could not be fetched, result indeterminate`;
  }
}
