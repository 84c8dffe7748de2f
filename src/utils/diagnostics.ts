export type DiagnosticKind =
  | "missing-students"
  | "multiple-versions"
  | "name-split"
  | "thresholds-order"
  | "letter-count"
  | "duplicate-column";

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  details: string[];
}

export interface DiagnosticsOptions {
  /** Print each warning with console.warn as it is recorded (default: true) */
  echo?: boolean;
}

/**
 * Collects non-fatal warnings raised while building a course or
 * computing grades, so one run can report all of them.
 */
export class Diagnostics {
  private readonly items: Diagnostic[] = [];
  private readonly echo: boolean;

  constructor(options: DiagnosticsOptions = {}) {
    this.echo = options.echo ?? true;
  }

  warn(kind: DiagnosticKind, message: string, details: string[] = []): void {
    this.items.push({ kind, message, details: [...details] });
    if (this.echo) {
      console.warn(
        details.length > 0 ? `${message}: ${details.join(", ")}` : message
      );
    }
  }

  get entries(): readonly Diagnostic[] {
    return this.items;
  }

  byKind(kind: DiagnosticKind): Diagnostic[] {
    return this.items.filter((item) => item.kind === kind);
  }
}
