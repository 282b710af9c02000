export type { BuildExtension, ExtensionRegistry } from "./types.js";
export { BaseExtension } from "./base.js";
