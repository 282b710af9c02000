export const LookupErrorCode = {
  EMPTY_PATH: "SHADERWEAVE_LOOKUP_EMPTY_PATH",
  INVALID_PATH: "SHADERWEAVE_LOOKUP_INVALID_PATH",
  ALREADY_ROOTED: "SHADERWEAVE_LOOKUP_ALREADY_ROOTED",
  IS_MODULE: "SHADERWEAVE_LOOKUP_IS_MODULE",
  NOT_FOUND: "SHADERWEAVE_LOOKUP_NOT_FOUND",
  ARTIFACT_MISSING: "SHADERWEAVE_LOOKUP_ARTIFACT_MISSING",
  CONFIG: "SHADERWEAVE_LOOKUP_CONFIG",
} as const;

export type LookupErrorCodeType = (typeof LookupErrorCode)[keyof typeof LookupErrorCode];

/**
 * A shader path that cannot be turned into an artifact. `path` is the path
 * exactly as the caller wrote it.
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public readonly code: LookupErrorCodeType,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LookupError";
  }
}

/** The path names a directory of shaders rather than a shader. */
export class ShaderIsModuleError extends LookupError {
  constructor(path: string, moduleName: string) {
    super(
      `\`${moduleName}\` is a module, not a shader file; add \`::\` and the shader's name`,
      LookupErrorCode.IS_MODULE,
      path,
    );
    this.name = "ShaderIsModuleError";
  }
}

export class ShaderNotFoundError extends LookupError {
  constructor(
    path: string,
    shaderName: string,
    /** Deepest path component that exists on disk; null when only the root does */
    public readonly lastExisting: string | null,
  ) {
    super(
      lastExisting === null
        ? `shader \`${shaderName}\` does not exist`
        : `shader \`${shaderName}\` does not exist (\`${lastExisting}\` is the last component of the path that exists)`,
      LookupErrorCode.NOT_FOUND,
      path,
    );
    this.name = "ShaderNotFoundError";
  }
}

/** A location the build publishes is not available. */
export class LookupConfigError extends LookupError {
  constructor(
    public readonly variable: string,
    path: string,
  ) {
    super(`${variable} is not set; run buildShaderDir first, or pass the location explicitly`, LookupErrorCode.CONFIG, path);
    this.name = "LookupConfigError";
  }
}
