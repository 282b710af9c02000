import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export interface Workspace {
  base: string;
  shaders: string;
  out: string;
  cleanup(): void;
}

/** Temp dir with `shaders/` laid out from `files` and an empty `out/`. */
export function createWorkspace(files: Record<string, string>): Workspace {
  const base = mkdtempSync(join(tmpdir(), "shaderweave-ext-"));
  const shaders = join(base, "shaders");
  const out = join(base, "out");
  mkdirSync(shaders);
  mkdirSync(out);

  for (const [rel, content] of Object.entries(files)) {
    const full = join(shaders, ...rel.split("/"));
    if (rel.endsWith("/")) {
      mkdirSync(full, { recursive: true });
    } else {
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, content);
    }
  }

  return { base, shaders, out, cleanup: () => rmSync(base, { recursive: true, force: true }) };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}
