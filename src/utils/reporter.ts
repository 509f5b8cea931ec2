export type ReportLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Reporter {
  recordEvent(level: ReportLevel, message: string): void;
}

const LEVEL_ORDER: Record<ReportLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export const isReportLevel = (value: string): value is ReportLevel =>
  Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);

export class ConsoleReporter implements Reporter {
  private minLevel: ReportLevel;
  private prefix: string;

  constructor(minLevel: ReportLevel = 'info', prefix: string = '[pdf-outline]') {
    this.minLevel = minLevel;
    this.prefix = prefix;
  }

  recordEvent(level: ReportLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const line = `${this.prefix} ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

export const silentReporter: Reporter = {
  recordEvent: () => undefined
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
