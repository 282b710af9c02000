/**
 * Import linker for the standard compiler.
 *
 * Recognizes whole-line module imports and inlines each imported module's
 * linked source once, ahead of the first module that imports it:
 *
 * ```wgsl
 * import package::common::math;   // <root>/common/math.wesl
 * import super::lighting;         // sibling of the current module
 * ```
 *
 * Nothing else about the shader is interpreted.
 */

import { ModulePath, MODULE_SEPARATOR, PACKAGE_KEYWORD } from "../model/module-path.js";
import type { BasicSourceMap, SourceLine } from "../model/source-map.js";
import { ResolveError } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { CompileOptions } from "./types.js";
import type { Resolver } from "./resolver.js";

const IMPORT_LINE = /^\s*import\s+((?:package|super)(?:::[\w-]+)+)\s*;\s*$/;
const LINE_COMMENT = /\/\/.*$/;
const SUPER_KEYWORD = "super";

export interface LinkResult {
  readonly code: string;
  readonly sourceMap: BasicSourceMap | null;
  readonly modules: readonly ModulePath[];
  readonly files: readonly string[];
}

interface OutputLine extends SourceLine {
  readonly text: string;
}

/**
 * Resolve the target of an import statement relative to the importing module.
 */
export function resolveImportPath(importPath: string, from: ModulePath): ModulePath {
  const parts = importPath.split(MODULE_SEPARATOR);
  if (parts[0] === PACKAGE_KEYWORD) {
    return new ModulePath("absolute", parts.slice(1));
  }

  let base = from.parent();
  let i = 0;
  while (parts[i] === SUPER_KEYWORD) {
    if (i > 0) {
      if (base.isRoot) {
        throw new ResolveError(`Import "${importPath}" climbs above the shader root`, from.toString());
      }
      base = base.parent();
    }
    i++;
  }
  return new ModulePath("absolute", [...base.components, ...parts.slice(i)]);
}

export function link(
  entry: ModulePath,
  resolver: Resolver,
  options: Readonly<CompileOptions>,
): LinkResult {
  const visited = new Set<string>();
  const sources: string[] = [];
  const modules: ModulePath[] = [];
  const files: string[] = [];
  const output: OutputLine[] = [];

  const visit = (modulePath: ModulePath): void => {
    const key = modulePath.withOrigin("absolute").toString();
    if (visited.has(key)) return;
    visited.add(key);

    const resolved = resolver.resolve(modulePath);
    const source = sources.push(resolved.relativeFile) - 1;
    debug.compile("link.module", { module: key, file: resolved.relativeFile });

    const lines = resolved.source.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }

    const body: OutputLine[] = [];
    lines.forEach((raw, line) => {
      const match = IMPORT_LINE.exec(raw);
      if (match?.[1]) {
        visit(resolveImportPath(match[1], modulePath));
        return;
      }
      let text = raw;
      if (options.stripComments) {
        text = raw.replace(LINE_COMMENT, "").trimEnd();
        if (text.length === 0 && raw.trim().length > 0) return;
      }
      body.push({ text, source, line });
    });

    output.push(...body);
    modules.push(modulePath);
    files.push(resolved.file);
  };

  visit(entry);

  const code = output.map((l) => l.text).join("\n") + "\n";
  const sourceMap: BasicSourceMap | null = options.sourceMap
    ? { sources, lines: output.map(({ source, line }) => ({ source, line })) }
    : null;

  return { code, sourceMap, modules, files };
}
