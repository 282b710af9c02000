/**
 * WGSL Tokenizer
 *
 * Splits WGSL source into identifiers, numbers, attributes, punctuation and
 * comments. Whitespace is dropped; every token keeps its 1-based line and
 * column. Block comments nest, as WGSL requires.
 *
 * This is a lexer only. It knows nothing about declarations; see reflect.ts.
 */

import { WgslSyntaxError } from "../errors.js";

export type TokenKind = "ident" | "number" | "attribute" | "symbol" | "comment";

export interface Token {
  kind: TokenKind;
  text: string;
  /** Character offset into the source */
  offset: number;
  line: number;
  column: number;
}

/* =============================================================================
 * LEXICAL GRAMMAR
 * ============================================================================= */

/** Multi-character punctuation, longest first for maximal munch */
export const MULTI_CHAR_SYMBOLS: readonly string[] = [
  "<<=", ">>=",
  "->", "&&", "||", "==", "!=", "<=", ">=", "<<", ">>",
  "++", "--", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "::",
];

const SINGLE_CHAR_SYMBOLS = new Set("(){}[]<>;:,.=+-*/%&|^!~?");

const IDENT_START = /[\p{L}_]/u;
const IDENT = /[\p{L}\p{N}_]*/uy;
const NUMBER =
  /0[xX][0-9a-fA-F]*(?:\.[0-9a-fA-F]*)?(?:[pP][+-]?[0-9]+)?[iufh]?|(?:[0-9]+\.[0-9]*|\.[0-9]+|[0-9]+)(?:[eE][+-]?[0-9]+)?[iufh]?/y;

/* =============================================================================
 * TOKENIZER
 * ============================================================================= */

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  let line = 1;
  let column = 1;

  const advance = (count: number): void => {
    for (let i = 0; i < count; i++) {
      if (source.charAt(offset) === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
      offset++;
    }
  };

  const push = (kind: TokenKind, length: number): void => {
    tokens.push({ kind, text: source.slice(offset, offset + length), offset, line, column });
    advance(length);
  };

  while (offset < source.length) {
    const ch = source.charAt(offset);
    const next = source.charAt(offset + 1);

    if (/\s/.test(ch)) {
      advance(1);
      continue;
    }

    if (ch === "/" && next === "/") {
      const end = source.indexOf("\n", offset);
      push("comment", (end === -1 ? source.length : end) - offset);
      continue;
    }

    if (ch === "/" && next === "*") {
      push("comment", blockCommentLength(source, offset, line, column));
      continue;
    }

    if (ch === "@") {
      const nameLength = identLength(source, offset + 1);
      if (nameLength === 0) {
        throw new WgslSyntaxError("Expected an attribute name after '@'", line, column);
      }
      push("attribute", nameLength + 1);
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === "." && /[0-9]/.test(next))) {
      NUMBER.lastIndex = offset;
      const match = NUMBER.exec(source);
      push("number", match ? match[0].length : 1);
      continue;
    }

    if (IDENT_START.test(ch)) {
      push("ident", identLength(source, offset));
      continue;
    }

    const multi = MULTI_CHAR_SYMBOLS.find((sym) => source.startsWith(sym, offset));
    if (multi) {
      push("symbol", multi.length);
      continue;
    }
    if (SINGLE_CHAR_SYMBOLS.has(ch)) {
      push("symbol", 1);
      continue;
    }

    throw new WgslSyntaxError(`Unexpected character '${ch}'`, line, column);
  }

  return tokens;
}

/** Tokens other than comments. */
export function significantTokens(tokens: readonly Token[]): Token[] {
  return tokens.filter((t) => t.kind !== "comment");
}

function identLength(source: string, start: number): number {
  if (!IDENT_START.test(source.charAt(start))) return 0;
  IDENT.lastIndex = start + 1;
  const match = IDENT.exec(source);
  return 1 + (match ? match[0].length : 0);
}

function blockCommentLength(source: string, start: number, line: number, column: number): number {
  let depth = 0;
  let i = start;
  while (i < source.length) {
    if (source.startsWith("/*", i)) {
      depth++;
      i += 2;
    } else if (source.startsWith("*/", i)) {
      depth--;
      i += 2;
      if (depth === 0) return i - start;
    } else {
      i++;
    }
  }
  throw new WgslSyntaxError("Unterminated block comment", line, column);
}
