/**
 * Path Codec
 *
 * Bijection between a (module path, item name) pair and a single flat
 * identifier that is safe as a file name and as a generated-code identifier.
 *
 * Layout:
 * ```
 * <prefix>(_<len>_<segment>)+      prefix: "package" (absolute) | "self" (package-relative)
 * ```
 * The last segment is the item name. Inside a segment `[A-Za-z0-9]` is kept
 * and every other code point is written `_<lowercase hex>_`; `<len>` is the
 * encoded segment length with no leading zero. The length prefix makes the
 * parse unique, so no character of an ordinary name is reserved.
 *
 * `package::sub` + `b` → `package_3_sub_1_b`
 * `package::my-shaders` + `blur_h` → `package_13_my_2d_shaders_9_blur_5f_h`
 *
 * The orchestrator, the lookup package and the Vite plugin all name artifacts
 * through this module and nothing else.
 */

import { ModulePath, type PathOrigin } from "../model/module-path.js";
import { BuildErrorCode, ConfigError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";

export type MangledIdentifier = string;

export interface Mangler {
  mangle(path: ModulePath, name: string): MangledIdentifier;
  unmangle(id: string): { path: ModulePath; name: string } | null;
}

const ORIGIN_PREFIX: Record<PathOrigin, string> = {
  "absolute": "package",
  "package-relative": "self",
};

const PLAIN_CHAR = /^[A-Za-z0-9]$/;
const HEX_DIGITS = /^[0-9a-f]+$/;
const LENGTH_DIGITS = /^[1-9][0-9]*$/;
const MAX_CODE_POINT = 0x10ffff;

/* =============================================================================
 * SEGMENTS
 * ============================================================================= */

function encodeSegment(segment: string): string {
  let out = "";
  for (const ch of segment) {
    if (PLAIN_CHAR.test(ch)) {
      out += ch;
    } else {
      out += `_${(ch.codePointAt(0) ?? 0).toString(16)}_`;
    }
  }
  return out;
}

/** Decode one segment; null when it is not in canonical encoded form. */
function decodeSegment(encoded: string): string | null {
  let out = "";
  let i = 0;
  while (i < encoded.length) {
    const ch = encoded.charAt(i);
    if (PLAIN_CHAR.test(ch)) {
      out += ch;
      i++;
      continue;
    }
    if (ch !== "_") return null;

    const close = encoded.indexOf("_", i + 1);
    if (close === -1) return null;
    const hex = encoded.slice(i + 1, close);
    if (!HEX_DIGITS.test(hex) || (hex.length > 1 && hex.startsWith("0"))) return null;

    const codePoint = parseInt(hex, 16);
    if (codePoint > MAX_CODE_POINT) return null;
    const decoded = String.fromCodePoint(codePoint);
    // Plain characters are never escaped by encodeSegment
    if (PLAIN_CHAR.test(decoded)) return null;

    out += decoded;
    i = close + 1;
  }
  return out;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Mangle a module path and item name into a flat identifier.
 * Pure: the same inputs give the same output in any process.
 */
export function mangle(path: ModulePath, name: string): MangledIdentifier {
  if (name.length === 0) {
    throw new ConfigError(
      `Cannot mangle an empty item name under ${path.toString()}`,
      BuildErrorCode.EMPTY_COMPONENT,
    );
  }
  let out = ORIGIN_PREFIX[path.origin];
  for (const segment of [...path.components, name]) {
    const encoded = encodeSegment(segment);
    out += `_${encoded.length}_${encoded}`;
  }
  return out;
}

/**
 * Recover the (path, name) pair from a mangled identifier.
 * Returns null, never throws, for anything `mangle` could not have produced.
 */
export function unmangle(id: string): { path: ModulePath; name: string } | null {
  const origin = originOf(id);
  if (origin === null) {
    debug.codec("unmangle.prefix-mismatch", { id });
    return null;
  }

  const rest = id.slice(ORIGIN_PREFIX[origin].length);
  const segments: string[] = [];
  let pos = 0;
  while (pos < rest.length) {
    if (rest.charAt(pos) !== "_") return null;
    const lengthEnd = rest.indexOf("_", pos + 1);
    if (lengthEnd === -1) return null;
    const digits = rest.slice(pos + 1, lengthEnd);
    if (!LENGTH_DIGITS.test(digits)) return null;

    const length = Number(digits);
    const start = lengthEnd + 1;
    if (start + length > rest.length) return null;
    const segment = decodeSegment(rest.slice(start, start + length));
    if (segment === null) return null;

    segments.push(segment);
    pos = start + length;
  }

  const name = segments.pop();
  if (name === undefined) return null;
  return { path: new ModulePath(origin, segments), name };
}

/**
 * `unmangle`, substituting the root path and the raw input as the name when
 * the input was never mangled.
 */
export function unmangleOrRoot(id: string): { path: ModulePath; name: string } {
  return unmangle(id) ?? { path: ModulePath.root(), name: id };
}

export function isMangled(id: string): boolean {
  return unmangle(id) !== null;
}

function originOf(id: string): PathOrigin | null {
  for (const origin of ["absolute", "package-relative"] as const) {
    if (id.startsWith(ORIGIN_PREFIX[origin])) return origin;
  }
  return null;
}

/** The build's only mangler, as an object for APIs that take a strategy. */
export const EscapeMangler: Mangler = { mangle, unmangle };
