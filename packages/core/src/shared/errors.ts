/**
 * Core Package - Error Types
 *
 * Every failure the build surfaces derives from ShaderweaveError and carries
 * a stable code. Nothing here is recovered locally: the orchestrator aborts
 * on the first error and hands it to the caller.
 */

/* =============================================================================
 * ERROR CODES
 * ============================================================================= */

export const BuildErrorCode = {
  IO: "SHADERWEAVE_IO",
  PATH_OUTSIDE_ROOT: "SHADERWEAVE_PATH_OUTSIDE_ROOT",
  ROOT_MISSING: "SHADERWEAVE_ROOT_MISSING",
  OUT_DIR_MISSING: "SHADERWEAVE_OUT_DIR_MISSING",
  EMPTY_COMPONENT: "SHADERWEAVE_EMPTY_COMPONENT",
  COMPILER_SEALED: "SHADERWEAVE_COMPILER_SEALED",
  RESOLVE: "SHADERWEAVE_RESOLVE",
  COMPILE: "SHADERWEAVE_COMPILE",
  EXTENSION: "SHADERWEAVE_EXTENSION",
} as const;

export type BuildErrorCodeType = (typeof BuildErrorCode)[keyof typeof BuildErrorCode];

/**
 * Lifecycle points at which an extension can fail, plus the release step
 * that runs after the walk.
 */
export type ExtensionStage =
  | "init-root"
  | "enter-module"
  | "exit-module"
  | "post-build"
  | "exit-root"
  | "dispose";

/* =============================================================================
 * ERROR CLASSES
 * ============================================================================= */

export class ShaderweaveError extends Error {
  constructor(
    message: string,
    public readonly code: BuildErrorCodeType,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ShaderweaveError";
  }
}

/** Unreadable directory entry, unwritable output file and the like. */
export class BuildIoError extends ShaderweaveError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`${message}: ${path}${cause ? ` (${errorMessage(cause)})` : ""}`, BuildErrorCode.IO, { cause });
    this.name = "BuildIoError";
  }
}

/** Invalid setup: a bad root, a path that escapes it, a sealed compiler. */
export class ConfigError extends ShaderweaveError {
  constructor(message: string, code: BuildErrorCodeType) {
    super(message, code);
    this.name = "ConfigError";
  }
}

export class ResolveError extends ShaderweaveError {
  constructor(
    message: string,
    public readonly modulePath: string,
  ) {
    super(message, BuildErrorCode.RESOLVE);
    this.name = "ResolveError";
  }
}

export class CompileError extends ShaderweaveError {
  constructor(
    message: string,
    public readonly modulePath: string,
    cause?: unknown,
  ) {
    super(message, BuildErrorCode.COMPILE, { cause });
    this.name = "CompileError";
  }
}

/**
 * An error thrown by an extension hook, tagged with the extension that threw
 * it and the lifecycle point it was in.
 */
export class ExtensionError extends ShaderweaveError {
  constructor(
    public readonly extensionName: string,
    public readonly stage: ExtensionStage,
    cause: unknown,
  ) {
    super(
      `Extension ${extensionName} error during ${stage}: ${errorMessage(cause)}`,
      BuildErrorCode.EXTENSION,
      { cause },
    );
    this.name = "ExtensionError";
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
