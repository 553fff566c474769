/**
 * User-facing output. Status lines go to stdout; warnings to stderr.
 * Logging is separate (pino, see lib/logger).
 */

export interface Output {
  line: (text?: string) => void;
  warn: (text: string) => void;
}

export function createConsoleOutput(): Output {
  return {
    line(text = ''): void {
      console.log(text);
    },
    warn(text: string): void {
      console.error(`Warning: ${text}`);
    },
  };
}
