/**
 * ledger-agent Logger
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug' | 'status';

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export interface LoggerOptions {
  verbose?: boolean;
  /** Bracketed prefix on every line (default: agent) */
  scope?: string;
  sink?: LogSink;
}

export class Logger {
  private verbose: boolean;
  private scope: string;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.scope = options.scope ?? 'agent';
    this.sink = options.sink ?? consoleSink;
  }

  /** Same settings, different prefix */
  child(scope: string): Logger {
    return new Logger({ verbose: this.verbose, scope, sink: this.sink });
  }

  info(message: string): void {
    this.sink('info', `[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    this.sink('warn', `[${this.scope}] ⚠️  ${message}`);
  }

  error(message: string): void {
    this.sink('error', `[${this.scope}] ❌ ${message}`);
  }

  success(message: string): void {
    this.sink('success', `[${this.scope}] ✓ ${message}`);
  }

  debug(message: string): void {
    if (this.verbose) {
      this.sink('debug', `[${this.scope}:debug] ${message}`);
    }
  }

  // Formatted output for status displays
  status(label: string, value: string | number, color?: 'green' | 'yellow' | 'red'): void {
    const padding = 15 - label.length;
    const spaces = ' '.repeat(Math.max(0, padding));
    let coloredValue = String(value);

    // ANSI colors
    if (color === 'green') coloredValue = `\x1b[32m${value}\x1b[0m`;
    if (color === 'yellow') coloredValue = `\x1b[33m${value}\x1b[0m`;
    if (color === 'red') coloredValue = `\x1b[31m${value}\x1b[0m`;

    this.sink('status', `${label}:${spaces}${coloredValue}`);
  }
}
