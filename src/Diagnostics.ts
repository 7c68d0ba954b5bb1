export type Severity = 'info' | 'warning' | 'error' | 'fatal';

const SEVERITY_ORDER: Record<Severity, number> = { info: 0, warning: 1, error: 2, fatal: 3 };

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

/**
 * One-way notification channel for parse diagnostics.
 */
export interface DiagnosticsSink {
  notify(severity: Severity, message: string): void;
}

/**
 * Sink writing to the console, dropping everything below `minSeverity`.
 */
export class ConsoleDiagnostics implements DiagnosticsSink {
  constructor(private readonly minSeverity: Severity = 'warning') {}

  public notify(severity: Severity, message: string): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.minSeverity]) return;
    switch (severity) {
      case 'info':
        console.log(message);
        break;
      case 'warning':
        console.warn(`Warning: ${message}`);
        break;
      case 'error':
        console.error(`Error: ${message}`);
        break;
      case 'fatal':
        console.error(`Fatal: ${message}`);
        break;
    }
  }
}
