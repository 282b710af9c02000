export {
  mangle,
  unmangle,
  unmangleOrRoot,
  isMangled,
  EscapeMangler,
  type Mangler,
  type MangledIdentifier,
} from "./mangler.js";
