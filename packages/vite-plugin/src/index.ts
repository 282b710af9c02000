/**
 * @shaderweave/vite-plugin
 *
 * @example
 * ```typescript
 * import { defineConfig } from "vite";
 * import { shaderweave } from "@shaderweave/vite-plugin";
 * import { BindingsExtension } from "@shaderweave/extensions";
 *
 * export default defineConfig({
 *   plugins: [
 *     shaderweave({
 *       shaderRoot: "./src/shaders",
 *       extensions: () => [new BindingsExtension({ bindingsRoot: "src/shader-bindings" })],
 *     }),
 *   ],
 * });
 * ```
 */

export { shaderweave } from "./plugin.js";
export { ShaderHost, SHADER_IMPORT_PREFIX, VIRTUAL_SHADER_PREFIX } from "./host.js";
export type { ShaderweavePluginOptions, HostConfig, HookContext } from "./types.js";
