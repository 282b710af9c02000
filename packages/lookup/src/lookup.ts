/**
 * Artifact Lookup
 *
 * The consuming side of a build: given a shader path such as
 * `lighting::pbr`, find the compiled artifact the build wrote for it. The
 * shader root and output dir are the ones the build published (through the
 * environment by default), and the artifact name comes from the same naming
 * glue the build used, so the two cannot drift apart.
 *
 * ```typescript
 * import { includeShader } from "@shaderweave/lookup";
 *
 * const wgsl = includeShader("lighting::pbr");
 * ```
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import {
  DEFAULT_ARTIFACT_EXTENSION,
  DEFAULT_SHADER_EXTENSIONS,
  MODULE_SEPARATOR,
  ModulePath,
  OUT_DIR_ENV,
  PACKAGE_KEYWORD,
  ROOT_PATH_ENV,
  artifactPathFor,
  debug,
} from "@shaderweave/core";
import {
  LookupConfigError,
  LookupError,
  LookupErrorCode,
  ShaderIsModuleError,
  ShaderNotFoundError,
} from "./errors.js";

export interface LookupOptions {
  /** Environment holding the published locations (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Explicit locations; each one given wins over the environment */
  shaderRoot?: string;
  outDir?: string;
  /** Source extensions the build recognized (default: wesl, wgsl) */
  shaderExtensions?: readonly string[];
  /** Artifact extension the build wrote (default: wgsl) */
  artifactExtension?: string;
}

export interface ResolvedShader {
  modulePath: ModulePath;
  sourceFile: string;
  artifactPath: string;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Resolve `a::b::c` (relative to the shader root, without `package`) to its
 * source file and artifact path. Checks the source tree only; the artifact
 * itself may not exist yet.
 */
export function resolveShaderArtifact(path: string, options: LookupOptions = {}): ResolvedShader {
  const modulePath = parseShaderPath(path);
  const env = options.env ?? process.env;
  const shaderRoot = options.shaderRoot ?? env[ROOT_PATH_ENV];
  if (!shaderRoot) throw new LookupConfigError(ROOT_PATH_ENV, path);
  const outDir = options.outDir ?? env[OUT_DIR_ENV];
  if (!outDir) throw new LookupConfigError(OUT_DIR_ENV, path);

  const sourceFile = findSource(path, modulePath, shaderRoot, options.shaderExtensions ?? DEFAULT_SHADER_EXTENSIONS);
  const artifactPath = artifactPathFor(outDir, modulePath, options.artifactExtension ?? DEFAULT_ARTIFACT_EXTENSION);
  debug.lookup("resolved", { path, sourceFile, artifactPath });

  return { modulePath, sourceFile, artifactPath };
}

/** The built WGSL for `path`. */
export function includeShader(path: string, options: LookupOptions = {}): string {
  const { artifactPath } = resolveShaderArtifact(path, options);
  try {
    return readFileSync(artifactPath, "utf-8");
  } catch (error) {
    throw new LookupError(
      `shader \`${path}\` has no built artifact at ${artifactPath}; rebuild the shaders`,
      LookupErrorCode.ARTIFACT_MISSING,
      path,
      { cause: error },
    );
  }
}

/* =============================================================================
 * INTERNALS
 * ============================================================================= */

function parseShaderPath(path: string): ModulePath {
  const components = path.trim().split(MODULE_SEPARATOR).map((c) => c.trim());
  const [first] = components;
  if (components.length === 1 && first === "") {
    throw new LookupError("the shader import path must be non-empty", LookupErrorCode.EMPTY_PATH, path);
  }
  if (first === PACKAGE_KEYWORD) {
    throw new LookupError(
      `path \`${path}\` is already based on the shader root; drop the leading \`${PACKAGE_KEYWORD}\``,
      LookupErrorCode.ALREADY_ROOTED,
      path,
    );
  }
  if (components.some((c) => c.length === 0)) {
    throw new LookupError(`shader path \`${path}\` has an empty component`, LookupErrorCode.INVALID_PATH, path);
  }
  return ModulePath.absolute(...components);
}

function findSource(
  path: string,
  modulePath: ModulePath,
  shaderRoot: string,
  extensions: readonly string[],
): string {
  const base = join(shaderRoot, ...modulePath.components);
  for (const ext of extensions) {
    const file = `${base}.${ext}`;
    if (existsSync(file)) return file;
  }

  const name = modulePath.last() ?? path;
  if (isDirectory(base)) {
    throw new ShaderIsModuleError(path, name);
  }

  // Walk up to the deepest directory on the path that does exist
  const dirs = modulePath.components.slice(0, -1);
  for (let n = dirs.length; n > 0; n--) {
    if (isDirectory(join(shaderRoot, ...dirs.slice(0, n)))) {
      throw new ShaderNotFoundError(path, name, dirs[n - 1] ?? null);
    }
  }
  throw new ShaderNotFoundError(path, name, null);
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}
