import { MinifyError, WgslSyntaxError } from "../errors.js";
import { serializeTokens } from "../wgsl/serialize.js";
import { significantTokens, tokenize, type Token } from "../wgsl/tokenizer.js";

const PAIRS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

/**
 * Strip comments and every space WGSL does not need. Rejects source with an
 * unterminated comment or unbalanced brackets rather than emit something the
 * driver will reject later.
 *
 * @param file - named in errors
 */
export function minifyWgsl(source: string, file?: string): string {
  let tokens: Token[];
  try {
    tokens = significantTokens(tokenize(source));
  } catch (error) {
    if (error instanceof WgslSyntaxError) {
      throw new MinifyError(error.reason, file, error.line ?? 1, error.column ?? 1);
    }
    throw error;
  }

  checkBrackets(tokens, file);

  const out = serializeTokens(tokens);
  return out.length > 0 ? `${out}\n` : "";
}

function checkBrackets(tokens: readonly Token[], file: string | undefined): void {
  const open: Token[] = [];
  for (const t of tokens) {
    if (t.kind !== "symbol") continue;
    if (t.text === "(" || t.text === "[" || t.text === "{") {
      open.push(t);
      continue;
    }
    const expected = PAIRS[t.text];
    if (expected === undefined) continue;

    const top = open.pop();
    if (!top) {
      throw new MinifyError(`Unmatched '${t.text}'`, file, t.line, t.column);
    }
    if (top.text !== expected) {
      throw new MinifyError(
        `'${t.text}' closes '${top.text}' opened at ${top.line}:${top.column}`,
        file,
        t.line,
        t.column,
      );
    }
  }

  const unclosed = open.pop();
  if (unclosed) {
    throw new MinifyError(`Unclosed '${unclosed.text}'`, file, unclosed.line, unclosed.column);
  }
}
