import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

type Sink = (line: string) => void;

// stdout belongs to the Ink renderer, so everything goes to stderr.
const stderrSink: Sink = (line) => {
  process.stderr.write(line + '\n');
};

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

export class Logger {
  private level: LogLevel;
  private readonly sink: Sink;

  constructor(level: LogLevel = 'info', sink: Sink = stderrSink) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    const tag = LEVEL_STYLE[level](`[${level}]`);
    const rest = args.map(formatArg);
    this.sink([tag, message, ...rest].join(' '));
  }
}

export const logger = new Logger(
  process.env.SESSION_MONITOR_DEBUG === '1' ? 'debug' : 'warn',
);

export function applyLogLevel(options: { debug: boolean }): void {
  logger.setLevel(options.debug ? 'debug' : 'warn');
}
