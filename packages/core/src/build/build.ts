/**
 * Build Orchestrator
 *
 * Walks the shader root depth-first, compiles every shader file and drives
 * the extension protocol:
 *
 * ```
 * initRoot (all)
 *   per directory: files first, then subdirectories
 *     file:   derive module path → mangle → compile → postBuild (all)
 *     subdir: enterModule (all) → recurse → exitModule (all)
 * exitRoot (all)
 * publish shader root + output dir
 * ```
 *
 * Everything is synchronous and sequential. The first error aborts the walk
 * and is returned to the caller; artifacts already written stay on disk.
 */

import { readdirSync, statSync, type Dirent } from "node:fs";
import { extname, isAbsolute, join, relative, sep } from "node:path";
import { ModulePath } from "../model/module-path.js";
import { artifactNameFor, artifactPath } from "../artifact/naming.js";
import type { PublishedArtifact, PublishedLocation } from "../artifact/publish.js";
import type { CompileRequest, CompiledArtifact } from "../compiler/types.js";
import type { BuildExtension } from "../extension/types.js";
import {
  BuildErrorCode,
  BuildIoError,
  CompileError,
  ConfigError,
  ExtensionError,
  ShaderweaveError,
  errorMessage,
  type ExtensionStage,
} from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import type { BuildLogger } from "../shared/logger.js";
import { resolveBuildOptions, type BuildShaderDirOptions, type ResolvedBuildOptions } from "./options.js";

/* =============================================================================
 * RESULT
 * ============================================================================= */

export interface BuildResult {
  readonly shaderRoot: string;
  readonly outDir: string;
  /** One entry per compiled shader, in walk order */
  readonly artifacts: readonly CompiledArtifact[];
  /** Every source file the build read, in first-read order */
  readonly touched: readonly string[];
  /** The location handed to the publish sinks */
  readonly published: PublishedLocation;
}

/**
 * State carried through the recursion. The compiler and the extensions come
 * from the resolved options; only the accumulators change.
 */
interface WalkState {
  readonly options: ResolvedBuildOptions;
  readonly artifacts: CompiledArtifact[];
  readonly touched: string[];
  readonly seenFiles: Set<string>;
  readonly seenModules: Set<string>;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Build every shader under `options.shaderRoot`.
 *
 * @example
 * ```typescript
 * const result = buildShaderDir({
 *   shaderRoot: "src/shaders",
 *   outDir: process.env.SHADERWEAVE_OUT_DIR,
 *   extensions: [new BindingsExtension({ bindingsRoot: "src/shader-bindings" })],
 * });
 * ```
 */
export function buildShaderDir(options: BuildShaderDirOptions): BuildResult {
  const resolved = resolveBuildOptions(options);
  const { shaderRoot, outDir, extensions, compiler, logger } = resolved;
  const state: WalkState = {
    options: resolved,
    artifacts: [],
    touched: [],
    seenFiles: new Set(),
    seenModules: new Set(),
  };

  try {
    for (const ext of extensions) {
      runHook(ext, "init-root", () => ext.initRoot(shaderRoot, compiler));
    }
    compiler.seal();

    walkDirectory(shaderRoot, state);

    for (const ext of extensions) {
      runHook(ext, "exit-root", () => ext.exitRoot(shaderRoot, compiler));
    }
  } catch (error) {
    const disposeError = disposeExtensions(extensions, logger);
    if (disposeError) logger.error(disposeError.message);
    throw error;
  }

  const disposeError = disposeExtensions(extensions, logger);
  if (disposeError) throw disposeError;

  const published: PublishedLocation = { shaderRoot, outDir };
  const manifest: PublishedArtifact[] = state.artifacts.map((a) => ({
    module: a.modulePath.toString(),
    artifact: a.artifactPath,
  }));
  for (const sink of resolved.publish) {
    sink.publish(published, manifest);
    debug.walk("publish", { sink: sink.name, shaderRoot, outDir });
  }

  return {
    shaderRoot,
    outDir,
    artifacts: state.artifacts,
    touched: state.touched,
    published,
  };
}

/**
 * Module path of a shader file: its directories under the root, then its
 * stem. `<root>/lighting/pbr.wesl` → `package::lighting::pbr`.
 */
export function deriveModulePath(shaderRoot: string, filePath: string): ModulePath {
  const rel = relative(shaderRoot, filePath);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ConfigError(
      `Shader file ${filePath} is not inside the shader root ${shaderRoot}`,
      BuildErrorCode.PATH_OUTSIDE_ROOT,
    );
  }

  const parts = rel.split(sep);
  const fileName = parts.pop() ?? rel;
  const stem = fileName.slice(0, fileName.length - extname(fileName).length);
  if (stem.length === 0) {
    throw new ConfigError(`Shader file ${filePath} has no name`, BuildErrorCode.EMPTY_COMPONENT);
  }
  return new ModulePath("absolute", [...parts, stem]);
}

/* =============================================================================
 * WALK
 * ============================================================================= */

function walkDirectory(dir: string, state: WalkState): void {
  const { extensions } = state.options;
  const { files, dirs } = readEntries(dir);
  debug.walk("dir", { dir, files: files.length, dirs: dirs.length });

  // Files strictly before subdirectories: extensions holding a per-directory
  // resource finish every sibling file before a subdirectory re-points it.
  for (const file of files) {
    buildFile(join(dir, file), state);
  }

  for (const sub of dirs) {
    const subDir = join(dir, sub);
    for (const ext of extensions) {
      runHook(ext, "enter-module", () => ext.enterModule(subDir));
    }

    walkDirectory(subDir, state);

    for (const ext of extensions) {
      runHook(ext, "exit-module", () => ext.exitModule(subDir));
    }
  }
}

function buildFile(filePath: string, state: WalkState): void {
  const { shaderRoot, outDir, extensions, shaderExtensions, artifactExtension, logger } = state.options;

  const ext = extname(filePath).slice(1);
  if (!shaderExtensions.includes(ext)) {
    debug.walk("file.skip", { file: filePath });
    return;
  }

  touch(filePath, state);

  const modulePath = deriveModulePath(shaderRoot, filePath);
  const moduleKey = modulePath.toString();
  if (state.seenModules.has(moduleKey)) {
    logger.warn(`skipping ${filePath}: module ${moduleKey} was already built from another file`);
    return;
  }
  state.seenModules.add(moduleKey);

  const artifactName = artifactNameFor(modulePath);
  const artifact = compileModule(state, {
    modulePath,
    artifactName,
    artifactPath: artifactPath(outDir, artifactName, artifactExtension),
  });
  for (const file of artifact.files) {
    touch(file, state);
  }
  state.artifacts.push(artifact);
  logger.info(`built: ${moduleKey}`);

  for (const ext of extensions) {
    runHook(ext, "post-build", () => ext.postBuild(modulePath, artifact.artifactPath, artifact.sourceMap));
  }
}

function compileModule(
  state: WalkState,
  request: CompileRequest,
): CompiledArtifact {
  try {
    return state.options.compiler.compile(request);
  } catch (error) {
    if (error instanceof ShaderweaveError) throw error;
    throw new CompileError(
      `Failed to compile ${request.modulePath.toString()}: ${errorMessage(error)}`,
      request.modulePath.toString(),
      error,
    );
  }
}

function readEntries(dir: string): { files: string[]; dirs: string[] } {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    throw new BuildIoError("Failed to read directory", dir, error);
  }

  const files: string[] = [];
  const dirs: string[] = [];
  for (const entry of entries) {
    const kind = entryKind(dir, entry);
    if (kind === "file") files.push(entry.name);
    else if (kind === "dir") dirs.push(entry.name);
  }
  files.sort();
  dirs.sort();
  return { files, dirs };
}

function entryKind(dir: string, entry: Dirent): "file" | "dir" | "other" {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "dir";
  if (!entry.isSymbolicLink()) return "other";

  const full = join(dir, entry.name);
  try {
    const stats = statSync(full);
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "dir";
    return "other";
  } catch (error) {
    throw new BuildIoError("Failed to follow symbolic link", full, error);
  }
}

function touch(file: string, state: WalkState): void {
  if (state.seenFiles.has(file)) return;
  state.seenFiles.add(file);
  state.touched.push(file);
  state.options.onTouched?.(file);
}

/* =============================================================================
 * EXTENSION DISPATCH
 * ============================================================================= */

function runHook(ext: BuildExtension, stage: ExtensionStage, hook: () => void): void {
  debug.extension("hook", { name: ext.name, stage });
  try {
    hook();
  } catch (error) {
    throw new ExtensionError(ext.name, stage, error);
  }
}

/**
 * Release every extension, continuing past failures. Returns the first
 * failure; the rest are logged.
 */
function disposeExtensions(extensions: readonly BuildExtension[], logger: BuildLogger): ExtensionError | null {
  let first: ExtensionError | null = null;
  for (const ext of extensions) {
    if (!ext.dispose) continue;
    try {
      ext.dispose();
    } catch (error) {
      const wrapped = new ExtensionError(ext.name, "dispose", error);
      if (first === null) {
        first = wrapped;
      } else {
        logger.error(wrapped.message);
      }
    }
  }
  return first;
}
