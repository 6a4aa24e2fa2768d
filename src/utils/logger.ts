/**
 * Diagnostic logging. Every line is echoed to the console and retained so the
 * full log of a run can be shipped alongside its results.
 */

export interface Logger {
  log(message: string): void;
  /** Everything logged so far, one entry per line */
  text(): string;
}

const PREFIX = '<test-reporter> ';

export interface LoggerOptions {
  echo?: boolean;    // Default: true (write each line to stdout)
}

export class BufferedLogger implements Logger {
  private readonly entries: string[] = [];
  private readonly echo: boolean;

  constructor(options: LoggerOptions = {}) {
    this.echo = options.echo ?? true;
  }

  log(message: string): void {
    this.entries.push(message);
    if (this.echo) {
      console.log(`${PREFIX}${message}`);
    }
  }

  text(): string {
    return this.entries.join('\n');
  }
}
