import type { ModulePath } from "../model/module-path.js";
import type { BasicSourceMap } from "../model/source-map.js";
import type { ShaderCompiler } from "../compiler/types.js";
import type { BuildExtension } from "./types.js";

/**
 * No-op defaults for every hook except postBuild. Extend this when an
 * extension only cares about a few lifecycle points.
 */
export abstract class BaseExtension implements BuildExtension {
  abstract readonly name: string;

  initRoot(_shaderRoot: string, _compiler: ShaderCompiler): void {}

  enterModule(_dirPath: string): void {}

  exitModule(_dirPath: string): void {}

  abstract postBuild(modulePath: ModulePath, artifactPath: string, sourceMap: BasicSourceMap | null): void;

  exitRoot(_shaderRoot: string, _compiler: ShaderCompiler): void {}
}
