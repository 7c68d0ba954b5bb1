import * as path from 'path';
import { DiagnosticsSink, Severity } from '../src/Diagnostics';

export interface CollectedDiagnostics extends DiagnosticsSink {
  messages: Array<[Severity, string]>;
  of(severity: Severity): string[];
}

export function collectDiagnostics(): CollectedDiagnostics {
  const messages: Array<[Severity, string]> = [];
  return {
    messages,
    notify(severity: Severity, message: string): void {
      messages.push([severity, message]);
    },
    of(severity: Severity): string[] {
      return messages.filter(([s]) => s === severity).map(([, m]) => m);
    }
  };
}

export function fixturePath(name: string): string {
  return path.join(__dirname, 'fixtures', name);
}

export function defined<T>(value: T | null | undefined): T {
  if (value === null || value === undefined) throw new Error('expected a value');
  return value;
}
