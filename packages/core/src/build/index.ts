export { buildShaderDir, deriveModulePath, type BuildResult } from "./build.js";
export {
  resolveBuildOptions,
  type BuildShaderDirOptions,
  type ResolvedBuildOptions,
} from "./options.js";
