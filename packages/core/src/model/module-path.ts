import { BuildErrorCode, ConfigError } from "../shared/errors.js";

/**
 * Where a module path is rooted. Resolved once when the path is derived and
 * never changed afterwards.
 */
export type PathOrigin = "absolute" | "package-relative";

export const MODULE_SEPARATOR = "::";
export const PACKAGE_KEYWORD = "package";

/**
 * Hierarchical identifier of a shader module, derived from its directory
 * nesting under the shader root. `root/a/b/c.wesl` is `package::a::b::c`.
 *
 * Immutable; equality and ordering are structural.
 */
export class ModulePath {
  readonly components: readonly string[];

  constructor(
    readonly origin: PathOrigin,
    components: readonly string[],
  ) {
    for (const component of components) {
      if (component.length === 0) {
        throw new ConfigError(
          `Module path components must be non-empty (got [${components.join(", ")}])`,
          BuildErrorCode.EMPTY_COMPONENT,
        );
      }
    }
    this.components = Object.freeze([...components]);
  }

  static root(origin: PathOrigin = "absolute"): ModulePath {
    return new ModulePath(origin, []);
  }

  static absolute(...components: string[]): ModulePath {
    return new ModulePath("absolute", components);
  }

  /**
   * Parse `package::a::b` (absolute) or `a::b` (package-relative).
   * A bare `package` is the absolute root.
   */
  static parse(text: string): ModulePath {
    const parts = text.trim().split(MODULE_SEPARATOR).map((s) => s.trim());
    if (parts[0] === PACKAGE_KEYWORD) {
      return new ModulePath("absolute", parts.slice(1));
    }
    if (parts.length === 1 && parts[0] === "") {
      return ModulePath.root("package-relative");
    }
    return new ModulePath("package-relative", parts);
  }

  get isRoot(): boolean {
    return this.components.length === 0;
  }

  get length(): number {
    return this.components.length;
  }

  /** The leaf identifier, or null for the root. */
  last(): string | null {
    return this.components[this.components.length - 1] ?? null;
  }

  /** The enclosing module. The root is its own parent. */
  parent(): ModulePath {
    return new ModulePath(this.origin, this.components.slice(0, -1));
  }

  join(...components: string[]): ModulePath {
    return new ModulePath(this.origin, [...this.components, ...components]);
  }

  withOrigin(origin: PathOrigin): ModulePath {
    return origin === this.origin ? this : new ModulePath(origin, this.components);
  }

  equals(other: ModulePath): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Total order: origin first (absolute < package-relative), then components
   * lexicographically, shorter prefix first.
   */
  compare(other: ModulePath): number {
    if (this.origin !== other.origin) {
      return this.origin === "absolute" ? -1 : 1;
    }
    const n = Math.min(this.components.length, other.components.length);
    for (let i = 0; i < n; i++) {
      const a = this.components[i] ?? "";
      const b = other.components[i] ?? "";
      if (a !== b) return a < b ? -1 : 1;
    }
    return this.components.length - other.components.length;
  }

  /** Root-relative file path without extension, always `/`-separated. */
  toRelativeFilePath(): string {
    return this.components.join("/");
  }

  toString(): string {
    if (this.origin === "absolute") {
      return [PACKAGE_KEYWORD, ...this.components].join(MODULE_SEPARATOR);
    }
    return this.components.join(MODULE_SEPARATOR);
  }
}
