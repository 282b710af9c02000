/**
 * Size Report Extension
 *
 * Records the line count of every shader before and after the build and
 * logs them as a table when the walk finishes:
 *
 * ```
 * name | source_lines | built_lines
 * ----------------------------------------------------
 * pbr | 42 | 1
 * ```
 *
 * Ordering: register last so built_lines reflects every rewrite.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  BaseExtension,
  BuildIoError,
  DEFAULT_SHADER_EXTENSIONS,
  ResolveError,
  consoleLogger,
  type BuildLogger,
  type ModulePath,
} from "@shaderweave/core";

export interface SizeRow {
  /** Leaf name of the module */
  name: string;
  module: string;
  sourceLines: number;
  builtLines: number;
}

export interface SizeReportOptions {
  logger?: BuildLogger;
  /** Extensions tried when locating a module's source file */
  shaderExtensions?: readonly string[];
}

export const SIZE_REPORT_HEADER = "name | source_lines | built_lines";
export const SIZE_REPORT_RULE = "-".repeat(52);

export class SizeReportExtension extends BaseExtension {
  override readonly name = "SizeReportExtension";
  private readonly logger: BuildLogger;
  private readonly shaderExtensions: readonly string[];
  private shaderRoot = "";
  private readonly collected: SizeRow[] = [];

  constructor(options: SizeReportOptions = {}) {
    super();
    this.logger = options.logger ?? consoleLogger;
    this.shaderExtensions = options.shaderExtensions ?? DEFAULT_SHADER_EXTENSIONS;
  }

  /** Rows recorded so far, in build order */
  get rows(): readonly SizeRow[] {
    return this.collected;
  }

  override initRoot(shaderRoot: string): void {
    this.shaderRoot = shaderRoot;
    this.collected.length = 0;
  }

  override postBuild(modulePath: ModulePath, artifactPath: string): void {
    this.collected.push({
      name: modulePath.last() ?? "",
      module: modulePath.toString(),
      sourceLines: countLines(readText(this.sourceFile(modulePath))),
      builtLines: countLines(readText(artifactPath)),
    });
  }

  override exitRoot(): void {
    this.logger.info(SIZE_REPORT_HEADER);
    this.logger.info(SIZE_REPORT_RULE);
    for (const row of this.collected) {
      this.logger.info(`${row.name} | ${row.sourceLines} | ${row.builtLines}`);
    }
  }

  private sourceFile(modulePath: ModulePath): string {
    const base = join(this.shaderRoot, ...modulePath.components);
    for (const ext of this.shaderExtensions) {
      const file = `${base}.${ext}`;
      if (existsSync(file)) return file;
    }
    throw new ResolveError(`No source file for ${modulePath.toString()} under ${this.shaderRoot}`, modulePath.toString());
  }
}

/** Line count the way a line iterator sees it: a trailing newline ends the last line. */
export function countLines(text: string): number {
  if (text.length === 0) return 0;
  const lines = text.split(/\r?\n/);
  return text.endsWith("\n") ? lines.length - 1 : lines.length;
}

function readText(file: string): string {
  try {
    return readFileSync(file, "utf-8");
  } catch (error) {
    throw new BuildIoError("Failed to read file", file, error);
  }
}
