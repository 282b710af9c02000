/**
 * @shaderweave/lookup
 *
 * Find shader artifacts from a previous build by module path.
 */

export {
  resolveShaderArtifact,
  includeShader,
  type LookupOptions,
  type ResolvedShader,
} from "./lookup.js";
export {
  LookupError,
  LookupErrorCode,
  ShaderIsModuleError,
  ShaderNotFoundError,
  LookupConfigError,
  type LookupErrorCodeType,
} from "./errors.js";
