import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export interface ShaderTree {
  /** Temp directory holding both the shader root and the output dir */
  base: string;
  root: string;
  outDir: string;
  cleanup(): void;
}

/**
 * Lay out a shader root in a fresh temp directory. Keys are `/`-separated
 * paths relative to the root; a key ending in `/` creates an empty directory.
 */
export function createShaderTree(files: Record<string, string>): ShaderTree {
  const base = mkdtempSync(join(tmpdir(), "shaderweave-"));
  const root = join(base, "shaders");
  const outDir = join(base, "out");
  mkdirSync(root);
  mkdirSync(outDir);

  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, ...rel.split("/"));
    if (rel.endsWith("/")) {
      mkdirSync(full, { recursive: true });
      continue;
    }
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }

  return {
    base,
    root,
    outDir,
    cleanup: () => rmSync(base, { recursive: true, force: true }),
  };
}
