/**
 * Build configuration: explicit options merged with the environment the
 * hosting build provides, resolved once before the walk.
 */

import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { BuildExtension } from "../extension/types.js";
import type { CompileOptions, ShaderCompiler } from "../compiler/types.js";
import { DEFAULT_SHADER_EXTENSIONS, FileResolver } from "../compiler/resolver.js";
import { StandardCompiler } from "../compiler/standard-compiler.js";
import { DEFAULT_ARTIFACT_EXTENSION } from "../artifact/naming.js";
import { OUT_DIR_ENV, envSink, type PublishSink } from "../artifact/publish.js";
import { BuildErrorCode, ConfigError } from "../shared/errors.js";
import { consoleLogger, type BuildLogger } from "../shared/logger.js";

export interface BuildShaderDirOptions {
  /** Root directory of all shaders */
  shaderRoot: string;

  /**
   * Directory for compiled artifacts. Supplied by the hosting build and never
   * created here. Defaults to `SHADERWEAVE_OUT_DIR`.
   */
  outDir?: string;

  /** Extensions, run in this order at every lifecycle point */
  extensions?: readonly BuildExtension[];

  /** Compiler to use (default: a StandardCompiler over `shaderRoot`) */
  compiler?: ShaderCompiler;

  /** Options for the default compiler; ignored when `compiler` is given */
  compileOptions?: Partial<CompileOptions>;

  /** Recognized shader file extensions, without the dot (default: wesl, wgsl) */
  shaderExtensions?: readonly string[];

  /** Extension of artifact files (default: wgsl) */
  artifactExtension?: string;

  /** Where to publish the shader root and output dir (default: process env) */
  publish?: readonly PublishSink[];

  logger?: BuildLogger;

  /** Rebuild trigger: called once for every source file the build read */
  onTouched?: (file: string) => void;

  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;

  /** Environment to read defaults from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedBuildOptions {
  shaderRoot: string;
  outDir: string;
  extensions: readonly BuildExtension[];
  compiler: ShaderCompiler;
  shaderExtensions: readonly string[];
  artifactExtension: string;
  publish: readonly PublishSink[];
  logger: BuildLogger;
  onTouched: ((file: string) => void) | null;
}

export function resolveBuildOptions(options: BuildShaderDirOptions): ResolvedBuildOptions {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const shaderRoot = resolve(cwd, options.shaderRoot);
  if (!isDirectory(shaderRoot)) {
    throw new ConfigError(`Shader root is not a directory: ${shaderRoot}`, BuildErrorCode.ROOT_MISSING);
  }

  const outDirOption = options.outDir ?? env[OUT_DIR_ENV];
  if (!outDirOption) {
    throw new ConfigError(
      `No output directory: pass outDir or set ${OUT_DIR_ENV}`,
      BuildErrorCode.OUT_DIR_MISSING,
    );
  }
  const outDir = resolve(cwd, outDirOption);
  if (!isDirectory(outDir)) {
    throw new ConfigError(`Output directory does not exist: ${outDir}`, BuildErrorCode.OUT_DIR_MISSING);
  }

  const shaderExtensions = options.shaderExtensions ?? DEFAULT_SHADER_EXTENSIONS;
  const compiler = options.compiler
    ?? new StandardCompiler(shaderRoot, options.compileOptions, new FileResolver(shaderRoot, shaderExtensions));

  return {
    shaderRoot,
    outDir,
    extensions: options.extensions ?? [],
    compiler,
    shaderExtensions,
    artifactExtension: options.artifactExtension ?? DEFAULT_ARTIFACT_EXTENSION,
    publish: options.publish ?? [envSink()],
    logger: options.logger ?? consoleLogger,
    onTouched: options.onTouched ?? null,
  };
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
