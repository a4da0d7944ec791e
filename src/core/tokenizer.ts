/**
 * ReportCalc – Tokenizer core
 *
 * Turns expression source into tokens. The parser pulls tokens lazily
 * through `Tokenizer.next()`; `tokenize()` materializes the whole stream
 * for tests and tooling.
 *
 * Token categories:
 *  - "identifier" – variable names and function names
 *  - "number"     – integer/float literals with optional exponent
 *  - "string"     – '...' or "..." literals
 *  - "template"   – `...${expr:spec}...` literals (format mode)
 *  - "operator"   – ** // == != <= >= => + - * / % < > and the rejected ! = && ||
 *  - "punct"      – ()[]{}.,:?;
 *  - "eof"
 *
 * There is no comment syntax: `//` is floor division.
 *
 * License: Apache-2.0
 */

import { createDisallowedError, createSyntaxError } from './errors';
import {
  isMultiCharOperator,
  isPunctuationChar,
  isSingleCharOperator,
} from './tokens';
import type { Token } from './tokens';

export type { Token, TokenType } from './tokens';

export interface TokenStream {
  source: string;
  tokens: Token[];
}

/**
 * Piece of a template literal. Offsets are absolute within the source.
 */
export type TemplateSegment =
  | { kind: 'text'; value: string; start: number; end: number }
  | { kind: 'slot'; start: number; end: number };

/////////////////////
// Public API      //
/////////////////////

/**
 * Tokenize a source string. The list always ends with one EOF token.
 */
export function tokenize(source: string): TokenStream {
  const tokenizer = new Tokenizer(source);
  const tokens: Token[] = [];

  for (;;) {
    const tok = tokenizer.next();
    tokens.push(tok);
    if (tok.type === 'eof') break;
  }

  return { source, tokens };
}

/**
 * Split the template literal spanning `[start, end)` (backticks included)
 * into text segments and `${...}` slots.
 */
export function splitTemplate(
  source: string,
  start: number,
  end: number,
): TemplateSegment[] {
  return scanTemplate(source, start, end).segments;
}

/////////////////////
// Implementation  //
/////////////////////

/**
 * Lazy tokenizer over `source.slice(start, end)`; offsets stay absolute so
 * sub-parsers over template slots report positions in the full source.
 */
export class Tokenizer {
  private readonly src: string;
  private readonly limit: number;
  private pos: number;

  constructor(source: string, start = 0, end = source.length) {
    this.src = source;
    this.pos = start;
    this.limit = end;
  }

  next(): Token {
    this.skipWhitespace();

    if (this.pos >= this.limit) {
      return { type: 'eof', value: '', start: this.limit, end: this.limit };
    }

    const start = this.pos;
    const ch = this.src.charCodeAt(this.pos);

    if (
      isDigit(ch) ||
      (ch === 46 /* . */ &&
        this.pos + 1 < this.limit &&
        isDigit(this.src.charCodeAt(this.pos + 1)))
    ) {
      return this.readNumberToken();
    }

    if (ch === 34 /* " */ || ch === 39 /* ' */) {
      return this.readStringToken();
    }

    if (ch === 96 /* ` */) {
      const { end } = scanTemplate(this.src, start, this.limit);
      this.pos = end;
      return {
        type: 'template',
        value: this.src.slice(start + 1, end - 1),
        start,
        end,
      };
    }

    if (isIdentifierStart(ch)) {
      return this.readIdentifierToken();
    }

    const twoChars =
      this.pos + 1 < this.limit ? this.src.slice(this.pos, this.pos + 2) : '';

    if (isMultiCharOperator(twoChars)) {
      this.pos += 2;
      return { type: 'operator', value: twoChars, start, end: start + 2 };
    }

    const singleChar = this.src[this.pos] ?? '';

    if (isSingleCharOperator(singleChar)) {
      this.pos++;
      return { type: 'operator', value: singleChar, start, end: start + 1 };
    }

    if (isPunctuationChar(singleChar)) {
      this.pos++;
      return { type: 'punct', value: singleChar, start, end: start + 1 };
    }

    throw createSyntaxError({
      message: `unexpected character "${singleChar}"`,
      source: this.src,
      index: start,
      length: 1,
    });
  }

  private skipWhitespace(): void {
    while (this.pos < this.limit && isWhitespace(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }
  }

  ///////////////////////
  // Token readers     //
  ///////////////////////

  private readNumberToken(): Token {
    const start = this.pos;

    while (this.pos < this.limit && isDigit(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }

    if (this.pos < this.limit && this.src.charCodeAt(this.pos) === 46 /* . */) {
      this.pos++;
      while (this.pos < this.limit && isDigit(this.src.charCodeAt(this.pos))) {
        this.pos++;
      }
    }

    if (this.pos < this.limit) {
      const c = this.src.charCodeAt(this.pos);
      if (c === 101 /* e */ || c === 69 /* E */) {
        let expPos = this.pos + 1;
        const sign = this.src.charCodeAt(expPos);
        if (sign === 43 /* + */ || sign === 45 /* - */) {
          expPos++;
        }
        if (expPos >= this.limit || !isDigit(this.src.charCodeAt(expPos))) {
          throw createSyntaxError({
            message: 'malformed number literal',
            source: this.src,
            index: start,
            length: expPos - start,
          });
        }
        this.pos = expPos;
        while (this.pos < this.limit && isDigit(this.src.charCodeAt(this.pos))) {
          this.pos++;
        }
      }
    }

    return {
      type: 'number',
      value: this.src.slice(start, this.pos),
      start,
      end: this.pos,
    };
  }

  private readStringToken(): Token {
    const quote = this.src.charCodeAt(this.pos);
    const start = this.pos;
    this.pos++;

    let value = '';
    let closed = false;

    while (this.pos < this.limit) {
      const ch = this.src.charCodeAt(this.pos);

      if (ch === quote) {
        this.pos++;
        closed = true;
        break;
      }

      if (ch === 92 /* \ */) {
        this.pos++;
        if (this.pos >= this.limit) break;
        value += decodeEscape(this.src.charCodeAt(this.pos));
        this.pos++;
      } else {
        value += String.fromCharCode(ch);
        this.pos++;
      }
    }

    if (!closed) {
      throw createSyntaxError({
        message: 'unterminated string literal',
        source: this.src,
        index: start,
        length: this.pos - start,
      });
    }

    return { type: 'string', value, start, end: this.pos };
  }

  private readIdentifierToken(): Token {
    const start = this.pos;
    this.pos++;

    while (this.pos < this.limit && isIdentifierPart(this.src.charCodeAt(this.pos))) {
      this.pos++;
    }

    return {
      type: 'identifier',
      value: this.src.slice(start, this.pos),
      start,
      end: this.pos,
    };
  }
}

////////////////////////////
// Template scanning      //
////////////////////////////

/**
 * Scan a template literal starting at the opening backtick. Slots are
 * matched by brace depth; quoted strings inside a slot are skipped whole.
 */
function scanTemplate(
  src: string,
  start: number,
  limit: number,
): { segments: TemplateSegment[]; end: number } {
  const segments: TemplateSegment[] = [];
  let pos = start + 1;
  let text = '';
  let textStart = pos;

  const flushText = (at: number): void => {
    if (text.length > 0) {
      segments.push({ kind: 'text', value: text, start: textStart, end: at });
    }
    text = '';
  };

  while (pos < limit) {
    const ch = src.charCodeAt(pos);

    if (ch === 96 /* ` */) {
      flushText(pos);
      return { segments, end: pos + 1 };
    }

    if (ch === 92 /* \ */ && pos + 1 < limit) {
      text += decodeEscape(src.charCodeAt(pos + 1));
      pos += 2;
      continue;
    }

    if (ch === 36 /* $ */ && src.charCodeAt(pos + 1) === 123 /* { */) {
      flushText(pos);
      const slotStart = pos + 2;
      const slotEnd = findSlotEnd(src, slotStart, limit);
      segments.push({ kind: 'slot', start: slotStart, end: slotEnd });
      pos = slotEnd + 1;
      textStart = pos;
      continue;
    }

    text += src[pos];
    pos++;
  }

  throw createSyntaxError({
    message: 'unterminated template literal',
    source: src,
    index: start,
    length: limit - start,
  });
}

function findSlotEnd(src: string, from: number, limit: number): number {
  let depth = 0;
  let pos = from;

  while (pos < limit) {
    const ch = src.charCodeAt(pos);

    if (ch === 34 /* " */ || ch === 39 /* ' */) {
      pos++;
      while (pos < limit && src.charCodeAt(pos) !== ch) {
        pos += src.charCodeAt(pos) === 92 /* \ */ ? 2 : 1;
      }
      pos++;
      continue;
    }

    if (ch === 96 /* ` */) {
      throw createDisallowedError({
        message: 'nested template literals are not allowed',
        source: src,
        index: pos,
        length: 1,
      });
    }

    if (ch === 123 /* { */) {
      depth++;
    } else if (ch === 125 /* } */) {
      if (depth === 0) return pos;
      depth--;
    }
    pos++;
  }

  throw createSyntaxError({
    message: 'unterminated "${" in template literal',
    source: src,
    index: from - 2,
    length: 2,
  });
}

////////////////////////////
// Character classification
////////////////////////////

function decodeEscape(esc: number): string {
  switch (esc) {
    case 110 /* n */:
      return '\n';
    case 114 /* r */:
      return '\r';
    case 116 /* t */:
      return '\t';
    default:
      return String.fromCharCode(esc);
  }
}

function isWhitespace(ch: number): boolean {
  return ch === 32 || ch === 9 || ch === 10 || ch === 13 || ch === 11 || ch === 12 || ch === 160;
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57;
}

function isIdentifierStart(ch: number): boolean {
  return (ch >= 65 && ch <= 90) || (ch >= 97 && ch <= 122) || ch === 95;
}

function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}
