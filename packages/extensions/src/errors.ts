/**
 * Extensions Package - Error Types
 *
 * Errors raised while reading or rewriting a compiled shader. They surface to
 * the build wrapped in the orchestrator's ExtensionError.
 */

export const ShaderToolErrorCode = {
  SYNTAX: "SHADERWEAVE_WGSL_SYNTAX",
  CODEGEN: "SHADERWEAVE_CODEGEN",
  MINIFY: "SHADERWEAVE_MINIFY",
  BINDINGS_STATE: "SHADERWEAVE_BINDINGS_STATE",
  BINDINGS_COLLISION: "SHADERWEAVE_BINDINGS_COLLISION",
} as const;

export type ShaderToolErrorCodeType = (typeof ShaderToolErrorCode)[keyof typeof ShaderToolErrorCode];

export class ShaderToolError extends Error {
  constructor(
    message: string,
    public readonly code: ShaderToolErrorCodeType,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ShaderToolError";
  }
}

/** Malformed WGSL, with a 1-based position. */
export class WgslSyntaxError extends ShaderToolError {
  constructor(
    public readonly reason: string,
    line: number,
    column: number,
  ) {
    super(`${reason} at ${line}:${column}`, ShaderToolErrorCode.SYNTAX, undefined, line, column);
    this.name = "WgslSyntaxError";
  }
}

export class CodegenError extends ShaderToolError {
  constructor(message: string, file: string, line?: number, column?: number, cause?: unknown) {
    const at = line === undefined ? file : `${file}:${line}:${column ?? 1}`;
    super(`${at}: ${message}`, ShaderToolErrorCode.CODEGEN, file, line, column, { cause });
    this.name = "CodegenError";
  }
}

export class MinifyError extends ShaderToolError {
  constructor(message: string, file: string | undefined, line: number, column: number) {
    super(`${message} at ${line}:${column}`, ShaderToolErrorCode.MINIFY, file, line, column);
    this.name = "MinifyError";
  }
}
