/**
 * shaderweave Vite Plugin
 *
 * Builds the shader tree when Vite starts a build (and once more for every
 * shader edit in dev), and serves `shader:` imports from the artifacts:
 *
 * ```typescript
 * import pbr from "shader:lighting::pbr";
 * device.createShaderModule({ code: pbr });
 * ```
 */

import type { Plugin, ViteDevServer } from "vite";
import { debug } from "@shaderweave/core";
import { ShaderHost, VIRTUAL_SHADER_PREFIX } from "./host.js";
import type { ShaderweavePluginOptions } from "./types.js";

export function shaderweave(options: ShaderweavePluginOptions): Plugin {
  const host = new ShaderHost(options);

  return {
    name: "shaderweave",

    // Claim `shader:` ids before other resolvers see them
    enforce: "pre",

    configResolved(config) {
      host.configure({ root: config.root, cacheDir: config.cacheDir, logger: config.logger });
    },

    buildStart() {
      host.build(this);
    },

    resolveId(id) {
      return host.resolveId(id);
    },

    load(id) {
      const code = host.load(id, this);
      return code === null ? null : { code, map: null };
    },

    /**
     * Rebuild on shader edits and reload the page, since every shader module
     * may inline a changed import.
     */
    configureServer(server) {
      const onShaderEvent = (file: string): void => {
        if (!host.isShaderFile(file)) return;
        debug.vite("watch", { file });
        if (host.rebuild(file)) {
          invalidateShaderModules(server);
          server.ws.send({ type: "full-reload" });
        }
      };
      server.watcher.on("change", onShaderEvent);
      server.watcher.on("add", onShaderEvent);
      server.watcher.on("unlink", onShaderEvent);
    },
  };
}

function invalidateShaderModules(server: ViteDevServer): void {
  for (const [id, mod] of server.moduleGraph.idToModuleMap) {
    if (id.startsWith(VIRTUAL_SHADER_PREFIX)) {
      server.moduleGraph.invalidateModule(mod);
    }
  }
}
