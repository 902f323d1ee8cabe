import { WarningsAsErrorsError } from './errors.js';
import type { Diagnostic, DiagnosticLevel, DiagnosticReporter } from './types.js';

export interface DiagnosticsOptions {
  reporter?: DiagnosticReporter;
  failOnWarnings?: boolean;
}

/**
 * Collects every message a build produces, in order.
 */
export class Diagnostics {
  readonly entries: Diagnostic[] = [];
  failOnWarnings: boolean;
  private readonly reporter?: DiagnosticReporter;

  constructor(options: DiagnosticsOptions = {}) {
    this.reporter = options.reporter;
    this.failOnWarnings = options.failOnWarnings ?? false;
  }

  error(message: string): void {
    this.record('error', message);
  }

  /**
   * Throws WarningsAsErrorsError after recording when failOnWarnings is set.
   */
  warning(message: string): void {
    this.record('warning', message);
    if (this.failOnWarnings) {
      throw new WarningsAsErrorsError(`Exiting due to warning: ${message}`);
    }
  }

  info(message: string): void {
    this.record('info', message);
  }

  success(message: string): void {
    this.record('success', message);
  }

  created(paths: readonly string[]): void {
    for (const p of paths) {
      this.info(`Created: ${p}`);
    }
  }

  errors(): string[] {
    return this.messages('error');
  }

  warnings(): string[] {
    return this.messages('warning');
  }

  private messages(level: DiagnosticLevel): string[] {
    return this.entries.filter(d => d.level === level).map(d => d.message);
  }

  private record(level: DiagnosticLevel, message: string): void {
    const diagnostic = { level, message };
    this.entries.push(diagnostic);
    this.reporter?.(diagnostic);
  }
}

const prefixes: Record<DiagnosticLevel, string> = {
  error: '❌',
  warning: '⚠️ ',
  info: '📝',
  success: '✨'
};

/**
 * Reporter that prints to the terminal
 */
export function consoleReporter(diagnostic: Diagnostic): void {
  const line = `${prefixes[diagnostic.level]} ${diagnostic.message}`;
  if (diagnostic.level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}
