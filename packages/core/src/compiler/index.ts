export type {
  CompileOptions,
  CompileRequest,
  CompiledArtifact,
  ShaderCompiler,
} from "./types.js";
export {
  FileResolver,
  DEFAULT_SHADER_EXTENSIONS,
  type Resolver,
  type ResolvedModule,
} from "./resolver.js";
export { link, resolveImportPath, type LinkResult } from "./linker.js";
export { StandardCompiler, DEFAULT_COMPILE_OPTIONS } from "./standard-compiler.js";
