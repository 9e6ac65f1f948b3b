import { Logger } from '@nestjs/common';
import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticLocation,
  DiagnosticSeverity,
} from '@brewsheet/shared';

/** Receives data-shape problems that the tabular layer recovers from */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export function createDiagnostic(
  code: DiagnosticCode,
  message: string,
  location?: DiagnosticLocation,
  severity: DiagnosticSeverity = 'error',
): Diagnostic {
  return location ? { code, severity, message, location } : { code, severity, message };
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `[${diagnostic.code}] ${diagnostic.message}`;
}

/**
 * Ordered diagnostic collector. Every entry is also written to the Nest logger,
 * errors at `error` level and the rest at `warn`.
 */
export class DiagnosticLog implements DiagnosticSink {
  private readonly logger: Logger;
  private readonly entries: Diagnostic[] = [];

  constructor(context: string = DiagnosticLog.name) {
    this.logger = new Logger(context);
  }

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    if (diagnostic.severity === 'error') {
      this.logger.error(formatDiagnostic(diagnostic));
    } else {
      this.logger.warn(formatDiagnostic(diagnostic));
    }
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  count(code?: DiagnosticCode): number {
    if (!code) return this.entries.length;
    return this.entries.filter((d) => d.code === code).length;
  }

  clear(): void {
    this.entries.length = 0;
  }
}
