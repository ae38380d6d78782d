import ora from "ora";

/**
 * The part of a terminal spinner the human reporter drives.
 * Each outcome method persists one line and stops spinning.
 */
export interface Spinner {
  text: string;
  readonly isSpinning: boolean;
  start(text: string): void;
  stop(): void;
  succeed(text: string): void;
  fail(text: string): void;
  warn(text: string): void;
  info(text: string): void;
}

/**
 * ora on stderr, so stdout only ever carries the manifest or JSON.
 */
export function createSpinner(stream: NodeJS.WritableStream = process.stderr): Spinner {
  const spinner = ora({ stream });

  return {
    get text() {
      return spinner.text;
    },
    set text(value: string) {
      spinner.text = value;
    },
    get isSpinning() {
      return spinner.isSpinning;
    },
    start: (text) => void spinner.start(text),
    stop: () => void spinner.stop(),
    succeed: (text) => void spinner.succeed(text),
    fail: (text) => void spinner.fail(text),
    warn: (text) => void spinner.warn(text),
    info: (text) => void spinner.info(text),
  };
}
