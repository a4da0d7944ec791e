/**
 * ReportCalc – Expression error types & helpers
 *
 * One canonical error class (`SafeEvalError`) for the tokenizer, parser,
 * validator and evaluator, with source positions and a caret snippet.
 *
 *   throw createSyntaxError({
 *     message: 'Unexpected token "*"',
 *     source,
 *     index: currentOffset,
 *   });
 *
 * License: Apache-2.0
 */

//////////////////////
// Error kinds      //
//////////////////////

/**
 * Category of an expression failure.
 */
export type SafeEvalErrorKind =
  /** Invalid tokens, unterminated strings, mismatched parentheses. */
  | 'syntax'
  /** Attribute access, indexing, calls outside the whitelist, forbidden names. */
  | 'disallowed'
  /** Reference to a name that has no binding. */
  | 'undefined'
  /** Expression too long or nested too deeply. */
  | 'too_complex'
  /** Failure while evaluating an accepted expression. */
  | 'execution';

/**
 * Stable codes for programmatic handling, one per kind.
 */
export type SafeEvalErrorCode =
  | 'E_SYNTAX'
  | 'E_DISALLOWED'
  | 'E_UNDEFINED'
  | 'E_COMPLEXITY'
  | 'E_EXECUTION';

const CODE_BY_KIND: Record<SafeEvalErrorKind, SafeEvalErrorCode> = {
  syntax: 'E_SYNTAX',
  disallowed: 'E_DISALLOWED',
  undefined: 'E_UNDEFINED',
  too_complex: 'E_COMPLEXITY',
  execution: 'E_EXECUTION',
};

export interface SafeEvalErrorOptions {
  kind: SafeEvalErrorKind;

  /** Short, single-line message. */
  message: string;

  /** Full expression source, used for line/column and the snippet. */
  source?: string;

  /** 0-based offset of the offending span. */
  index?: number;

  /** Length of the offending span (caret count). */
  length?: number;

  /**
   * Hint shown next to the message, e.g.
   *
   *   "did you mean '==' instead of '='?"
   */
  note?: string;

  cause?: unknown;
}

/**
 * Error raised for any rejected or failing expression.
 *
 * The snippet looks like:
 *
 *   B1 * 2 .. 3
 *          ^ --- unexpected token "."
 */
export class SafeEvalError extends Error {
  public override readonly name = 'SafeEvalError';
  public readonly kind: SafeEvalErrorKind;
  public readonly code: SafeEvalErrorCode;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  public readonly snippet: string;
  public readonly note?: string;

  constructor(opts: SafeEvalErrorOptions) {
    super(opts.message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    Object.setPrototypeOf(this, new.target.prototype);

    this.kind = opts.kind;
    this.code = CODE_BY_KIND[opts.kind];

    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    let line: number | null = null;
    let column: number | null = null;
    let snippet = '';

    if (opts.source && index != null) {
      const snip = buildSnippet(opts.source, index, opts.length ?? 1, opts.message);
      line = snip.line;
      column = snip.column;
      snippet = snip.snippet;
    }

    this.index = index;
    this.line = line;
    this.column = column;
    this.snippet = snippet;
    this.note = opts.note;
  }
}

export function isSafeEvalError(err: unknown): err is SafeEvalError {
  return err instanceof SafeEvalError;
}

/**
 * Raised by the evaluator when a divisor is zero. Formula mode turns it into
 * a result of `0`; format mode reports it as an execution error.
 */
export class DivisionByZeroError extends SafeEvalError {
  constructor(opts: Omit<SafeEvalErrorOptions, 'kind' | 'message'> & { message?: string }) {
    super({ ...opts, kind: 'execution', message: opts.message ?? 'division by zero' });
  }
}

/////////////////////////////
// Public factory helpers  //
/////////////////////////////

type FactoryOptions = Omit<SafeEvalErrorOptions, 'kind'>;

export function createSyntaxError(opts: FactoryOptions): SafeEvalError {
  return new SafeEvalError({ ...opts, kind: 'syntax' });
}

/**
 * Constructs outside the whitelisted grammar.
 */
export function createDisallowedError(opts: FactoryOptions): SafeEvalError {
  return new SafeEvalError({ ...opts, kind: 'disallowed' });
}

export function createUndefinedError(opts: FactoryOptions): SafeEvalError {
  return new SafeEvalError({ ...opts, kind: 'undefined' });
}

/**
 * Length and depth limits.
 */
export function createComplexityError(opts: FactoryOptions): SafeEvalError {
  return new SafeEvalError({ ...opts, kind: 'too_complex' });
}

export function createExecutionError(opts: FactoryOptions): SafeEvalError {
  return new SafeEvalError({ ...opts, kind: 'execution' });
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * 1-based line and column for an offset. CRLF counts as one break.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  index = clamp(index, 0, Math.max(0, source.length - 1));

  let line = 1;
  let lastLineStart = 0;

  for (let i = 0; i < source.length && i < index; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 /* \n */) {
      line++;
      lastLineStart = i + 1;
    } else if (ch === 13 /* \r */) {
      line++;
      if (i + 1 < source.length && source.charCodeAt(i + 1) === 10) {
        i++;
      }
      lastLineStart = i + 1;
    }
  }

  return { line, column: index - lastLineStart + 1 };
}

/**
 * The offending line followed by a caret line:
 *
 *   max(A, B
 *          ^ --- expected ")"
 */
export function buildSnippet(
  source: string,
  index: number,
  length: number,
  messageForArrow: string,
): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const errorLine = source.split(/\r\n|\r|\n/)[line - 1] ?? '';

  const startCol = clamp(column, 1, Math.max(errorLine.length, 1));
  const caretLength = Math.max(1, Math.min(length, errorLine.length - startCol + 1));

  const arrowMessage =
    messageForArrow.trim().length > 0 ? ` --- ${messageForArrow}` : '';

  const caretLine = `${' '.repeat(startCol - 1)}${'^'.repeat(caretLength)}${arrowMessage}`;

  return { line, column, snippet: `${errorLine}\n${caretLine}` };
}

function clamp(n: number, min: number, max: number): number {
  if (Number.isNaN(n)) return min;
  if (n < min) return min;
  if (n > max) return max;
  return n;
}
