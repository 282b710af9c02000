export {
  tokenize,
  significantTokens,
  MULTI_CHAR_SYMBOLS,
  type Token,
  type TokenKind,
} from "./tokenizer.js";
export { serializeTokens, needsSpace } from "./serialize.js";
export {
  reflectWgsl,
  type ShaderReflection,
  type StructInfo,
  type StructMember,
  type ResourceBinding,
  type EntryPoint,
  type ShaderStage,
  type WorkgroupDimension,
} from "./reflect.js";
