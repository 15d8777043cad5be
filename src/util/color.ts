/* src/util/color.ts
 * Semantic styles for log lines and table headers. Output stays plain when
 * stdout is not a TTY or the environment asks for it.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type Style = 'error' | 'warn' | 'heading' | 'muted';

const STYLES: Record<Style, ChalkInstance> = {
  error: chalk.red,
  warn: chalk.hex('#FFA500'),
  heading: chalk.bold,
  muted: chalk.dim,
};

/** BATCH_BORING=1, NO_COLOR=1 and FORCE_COLOR=0 all force plain output. */
export const plainOutput = (
  env: NodeJS.ProcessEnv = process.env,
  tty: boolean = Boolean(process.stdout.isTTY),
): boolean =>
  !tty ||
  env.BATCH_BORING === '1' ||
  env.NO_COLOR === '1' ||
  env.FORCE_COLOR === '0';

// Evaluated per call: the CLI's --boring flag sets the environment late.
export const paint = (style: Style, s: string): string =>
  plainOutput() ? s : STYLES[style](s);
