import { MULTI_CHAR_SYMBOLS, type Token, type TokenKind } from "./tokenizer.js";

const WORD_KINDS: ReadonlySet<TokenKind> = new Set(["ident", "number", "attribute"]);

/**
 * Whether `prev` and `next` would lex differently if printed with nothing
 * between them.
 */
export function needsSpace(prev: Token, next: Token): boolean {
  if (WORD_KINDS.has(prev.kind) && (next.kind === "ident" || next.kind === "number")) {
    return true;
  }
  if (prev.kind === "symbol" && next.kind === "symbol") {
    const joined = prev.text + next.text.charAt(0);
    return joined === "//" || joined === "/*" || MULTI_CHAR_SYMBOLS.some((sym) => sym.startsWith(joined));
  }
  return false;
}

/**
 * Print tokens with the fewest spaces that keep them apart. Comments are
 * dropped.
 */
export function serializeTokens(tokens: readonly Token[]): string {
  let out = "";
  let prev: Token | null = null;
  for (const token of tokens) {
    if (token.kind === "comment") continue;
    if (prev && needsSpace(prev, token)) out += " ";
    out += token.text;
    prev = token;
  }
  return out;
}
