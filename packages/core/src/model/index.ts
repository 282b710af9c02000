export {
  ModulePath,
  MODULE_SEPARATOR,
  PACKAGE_KEYWORD,
  type PathOrigin,
} from "./module-path.js";
export { originalPosition, type BasicSourceMap, type SourceLine } from "./source-map.js";
