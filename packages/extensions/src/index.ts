/**
 * @shaderweave/extensions
 *
 * Ready-made build extensions. Register them in this order:
 *
 * ```typescript
 * import { buildShaderDir } from "@shaderweave/core";
 * import { BindingsExtension, MinifierExtension, SizeReportExtension } from "@shaderweave/extensions";
 *
 * buildShaderDir({
 *   shaderRoot: "src/shaders",
 *   outDir: "dist/shaders",
 *   extensions: [
 *     new BindingsExtension({ bindingsRoot: "src/shader-bindings" }),
 *     new MinifierExtension({ releaseOnly: true }),
 *     new SizeReportExtension(),
 *   ],
 * });
 * ```
 */

// === Extensions ===
export {
  BindingsExtension,
  BARREL_FILE,
  BARREL_HEADER,
  BARREL_STEM_SUFFIX,
  type BindingsExtensionOptions,
} from "./bindings/bindings-extension.js";
export { MinifierExtension, type MinifierOptions } from "./minify/minifier-extension.js";
export {
  SizeReportExtension,
  SIZE_REPORT_HEADER,
  SIZE_REPORT_RULE,
  countLines,
  type SizeReportOptions,
  type SizeRow,
} from "./size/size-report-extension.js";

// === Codegen & minification ===
export {
  generateBindings,
  DEFAULT_CODEGEN_OPTIONS,
  type CodegenOptions,
  type Demangler,
} from "./bindings/codegen.js";
export { bindingIdentifier, isValidIdentifier } from "./bindings/identifier.js";
export { minifyWgsl } from "./minify/minify.js";

// === WGSL ===
export * from "./wgsl/index.js";

// === Errors ===
export {
  ShaderToolError,
  ShaderToolErrorCode,
  WgslSyntaxError,
  CodegenError,
  MinifyError,
  type ShaderToolErrorCodeType,
} from "./errors.js";
