export class InstrumentationError extends Error {
  readonly filename: string;

  constructor(message: string, filename: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InstrumentationError";
    this.filename = filename;
  }
}

// The source text itself is malformed; nothing was instrumented.
export class InstrumentParseError extends InstrumentationError {
  readonly line?: number;
  readonly column?: number;

  constructor(
    message: string,
    filename: string,
    loc?: { line: number; column: number },
    options?: { cause?: unknown }
  ) {
    super(message, filename, options);
    this.name = "InstrumentParseError";
    this.line = loc?.line;
    this.column = loc?.column;
  }
}

// Parsing succeeded but the rewritten tree could not be turned back into
// runnable code. Points at a rewriter defect rather than bad input.
export class InstrumentFinalizeError extends InstrumentationError {
  constructor(message: string, filename: string, options?: { cause?: unknown }) {
    super(message, filename, options);
    this.name = "InstrumentFinalizeError";
  }
}

export class TraceFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TraceFormatError";
  }
}
