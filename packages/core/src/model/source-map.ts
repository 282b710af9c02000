/**
 * Line-granular source map produced by the standard compiler.
 *
 * `lines[i]` is the origin of generated line `i` (both 0-based): an index
 * into `sources` and the line within that source.
 */
export interface BasicSourceMap {
  readonly sources: readonly string[];
  readonly lines: readonly SourceLine[];
}

export interface SourceLine {
  readonly source: number;
  readonly line: number;
}

/** Origin of a generated line, or null when it has none (or is out of range). */
export function originalPosition(
  map: BasicSourceMap,
  generatedLine: number,
): { file: string; line: number } | null {
  const entry = map.lines[generatedLine];
  if (!entry) return null;
  const file = map.sources[entry.source];
  if (file === undefined) return null;
  return { file, line: entry.line };
}
