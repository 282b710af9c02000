import { existsSync, readFileSync } from "node:fs";
import { join, relative, sep } from "node:path";
import type { ModulePath } from "../model/module-path.js";
import { BuildIoError, ResolveError } from "../shared/errors.js";

export const DEFAULT_SHADER_EXTENSIONS: readonly string[] = ["wesl", "wgsl"];

export interface ResolvedModule {
  readonly modulePath: ModulePath;
  /** Absolute file path */
  readonly file: string;
  /** File path relative to the shader root, `/`-separated */
  readonly relativeFile: string;
  readonly source: string;
}

export interface Resolver {
  resolve(modulePath: ModulePath): ResolvedModule;
}

/**
 * Maps `package::a::b` to `<root>/a/b.<ext>`, trying each extension in order.
 */
export class FileResolver implements Resolver {
  constructor(
    readonly root: string,
    readonly extensions: readonly string[] = DEFAULT_SHADER_EXTENSIONS,
  ) {}

  resolve(modulePath: ModulePath): ResolvedModule {
    if (modulePath.isRoot) {
      throw new ResolveError("The root module is a directory, not a shader", modulePath.toString());
    }

    const base = join(this.root, ...modulePath.components);
    for (const ext of this.extensions) {
      const file = `${base}.${ext}`;
      if (!existsSync(file)) continue;

      let source: string;
      try {
        source = readFileSync(file, "utf-8");
      } catch (error) {
        throw new BuildIoError("Failed to read shader", file, error);
      }
      return {
        modulePath,
        file,
        relativeFile: relative(this.root, file).split(sep).join("/"),
        source,
      };
    }

    throw new ResolveError(
      `No shader found for ${modulePath.toString()} (tried ${this.extensions.map((e) => `.${e}`).join(", ")})`,
      modulePath.toString(),
    );
  }
}
