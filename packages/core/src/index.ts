/**
 * @shaderweave/core
 *
 * Walks a tree of shader sources, compiles each file and runs an ordered set
 * of extensions over every compiled artifact.
 *
 * @example
 * ```typescript
 * import { buildShaderDir } from "@shaderweave/core";
 *
 * buildShaderDir({
 *   shaderRoot: "src/shaders",
 *   outDir: "dist/shaders",
 *   extensions: [],
 * });
 * ```
 */

// === Orchestrator ===
export {
  buildShaderDir,
  deriveModulePath,
  resolveBuildOptions,
  type BuildResult,
  type BuildShaderDirOptions,
  type ResolvedBuildOptions,
} from "./build/index.js";

// === Model ===
export {
  ModulePath,
  MODULE_SEPARATOR,
  PACKAGE_KEYWORD,
  originalPosition,
  type PathOrigin,
  type BasicSourceMap,
  type SourceLine,
} from "./model/index.js";

// === Path codec ===
export {
  mangle,
  unmangle,
  unmangleOrRoot,
  isMangled,
  EscapeMangler,
  type Mangler,
  type MangledIdentifier,
} from "./codec/index.js";

// === Artifact naming & publishing ===
export {
  artifactNameFor,
  artifactPath,
  artifactPathFor,
  DEFAULT_ARTIFACT_EXTENSION,
  envSink,
  manifestSink,
  ROOT_PATH_ENV,
  OUT_DIR_ENV,
  type PublishSink,
  type PublishedLocation,
  type PublishedArtifact,
} from "./artifact/index.js";

// === Extension protocol ===
export { BaseExtension, type BuildExtension, type ExtensionRegistry } from "./extension/index.js";

// === Compiler ===
export {
  StandardCompiler,
  FileResolver,
  link,
  resolveImportPath,
  DEFAULT_COMPILE_OPTIONS,
  DEFAULT_SHADER_EXTENSIONS,
  type CompileOptions,
  type CompileRequest,
  type CompiledArtifact,
  type ShaderCompiler,
  type Resolver,
  type ResolvedModule,
  type LinkResult,
} from "./compiler/index.js";

// === Shared ===
export {
  BuildErrorCode,
  ShaderweaveError,
  BuildIoError,
  ConfigError,
  ResolveError,
  CompileError,
  ExtensionError,
  errorMessage,
  debug,
  configureDebug,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV,
  consoleLogger,
  silentLogger,
  type BuildErrorCodeType,
  type ExtensionStage,
  type BuildLogger,
  type Debug,
  type DebugChannel,
  type DebugChannelName,
  type DebugConfig,
  type DebugData,
} from "./shared/index.js";
