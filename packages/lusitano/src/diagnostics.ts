export type Phase = "lexical" | "syntax" | "semantic";

/**
 * `fatal` diagnostics stop the pipeline before code generation (the phase that
 * raised them still recovers and keeps going). `error` fails the compilation
 * but code is still generated. `warning` is reported alongside.
 */
export type Severity = "fatal" | "error" | "warning";

export type DiagnosticCode =
  | "UnrecognizedCharacterError"
  | "UnterminatedStringError"
  | "UnterminatedCommentError"
  | "SyntaxError"
  | "DuplicateDeclarationError"
  | "UndeclaredIdentifierError"
  | "TypeMismatchError"
  | "ConstantReassignmentError"
  | "ReturnTypeMismatchError"
  | "ArgumentCountMismatchError"
  | "MissingReturnWarning";

export interface Diagnostic {
  phase: Phase;
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  line: number;
  column: number;
  /** Syntax errors only. */
  expected?: string;
  /** Syntax errors only. */
  found?: string;
}

/** Ordered collector shared by every phase of one compilation. */
export class DiagnosticBag {
  private items: Diagnostic[] = [];

  public lexical(code: DiagnosticCode, message: string, line: number, column: number) {
    this.items.push({ phase: "lexical", severity: "fatal", code, message, line, column });
  }

  public syntax(expected: string, found: string, line: number, column: number, message?: string) {
    this.items.push({
      phase: "syntax",
      severity: "fatal",
      code: "SyntaxError",
      message: message ?? `expected ${expected}, found ${found}`,
      line,
      column,
      expected,
      found,
    });
  }

  public semantic(code: DiagnosticCode, message: string, line: number, column: number, severity: Severity = "error") {
    this.items.push({ phase: "semantic", severity, code, message, line, column });
  }

  public all(): readonly Diagnostic[] {
    return this.items;
  }

  public hasFatal(): boolean {
    return this.items.some(d => d.severity === "fatal");
  }

  public get size(): number {
    return this.items.length;
  }
}

export function groupByPhase(diagnostics: readonly Diagnostic[]): Record<Phase, Diagnostic[]> {
  const groups: Record<Phase, Diagnostic[]> = { lexical: [], syntax: [], semantic: [] };
  for (const d of diagnostics) {
    groups[d.phase].push(d);
  }
  return groups;
}
