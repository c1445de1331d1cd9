/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A translator diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `VMA001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic (unexpected exception). */
  Unknown: 'VMA000',

  /** Failed to read the input file. */
  IoReadFailed: 'VMA001',

  /** Failed to write to the output sink. */
  IoWriteFailed: 'VMA002',

  /** First token is not a known command, label token is malformed, or trailing operands. */
  MalformedInstruction: 'VMA100',

  /** Fewer tokens than the command class requires. */
  InsufficientTokens: 'VMA101',

  /** Index/count operand is not a non-negative decimal integer. */
  InvalidIndex: 'VMA102',

  /** Segment name is absent from the segment table. */
  UnknownSegment: 'VMA200',

  /** Arithmetic dispatch received a token outside the operator set. */
  InvalidOperator: 'VMA201',

  /** Segment cannot be used with the requested command (`pop constant`). */
  InvalidSegmentAccess: 'VMA202',

  /** Index does not fit the segment (or the 15-bit constant range). */
  IndexOutOfRange: 'VMA203',

  /** `advance()` called with no remaining instruction. */
  ExhaustedInput: 'VMA300',

  /** Parser accessor used before `advance()`, or for an argument the command lacks. */
  NoCurrentCommand: 'VMA301',

  /** Lifecycle violation (`run()` or `close()` called in the wrong state). */
  TranslatorState: 'VMA302',

  /** Command is recognized but not translated; no code is emitted for it. */
  UnsupportedCommand: 'VMA400',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Terminal translation failure. Carries the diagnostic that the pipeline reports.
 */
export class TranslateError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'TranslateError';
    this.diagnostic = diagnostic;
  }

  get id(): DiagnosticId {
    return this.diagnostic.id;
  }
}

/**
 * Build and return (for `throw`) an error-severity {@link TranslateError}.
 */
export function translateError(
  id: DiagnosticId,
  message: string,
  file: string,
  line?: number,
): TranslateError {
  return new TranslateError({
    id,
    severity: 'error',
    message,
    file,
    ...(line !== undefined ? { line } : {}),
  });
}
