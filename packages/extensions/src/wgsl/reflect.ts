/**
 * WGSL Reflection
 *
 * Reads the module-scope declarations binding generators care about:
 * structs, resource variables carrying `@group`/`@binding`, and stage entry
 * points. Everything else at module scope (constants, aliases, directives,
 * helper functions) is skipped without being interpreted.
 */

import { WgslSyntaxError } from "../errors.js";
import { serializeTokens } from "./serialize.js";
import { significantTokens, tokenize, type Token } from "./tokenizer.js";

/* =============================================================================
 * TYPES
 * ============================================================================= */

export interface StructMember {
  name: string;
  /** Type as written, minimally spaced (`array<vec4<f32>,4>`) */
  type: string;
}

export interface StructInfo {
  name: string;
  members: StructMember[];
}

export interface ResourceBinding {
  group: number;
  binding: number;
  name: string;
  /** `uniform`, `storage`, ...; null for handles (textures, samplers) */
  addressSpace: string | null;
  access: string | null;
  type: string;
}

export type WorkgroupDimension = number | string;

export type ShaderStage = "vertex" | "fragment" | "compute";

export interface EntryPoint {
  name: string;
  stage: ShaderStage;
  /**
   * Only for compute entry points. A dimension given as a const or override
   * expression is kept as its text (`"WG"`, `"WG/2"`).
   */
  workgroupSize: WorkgroupDimension[] | null;
}

export interface ShaderReflection {
  structs: StructInfo[];
  bindings: ResourceBinding[];
  entryPoints: EntryPoint[];
}

interface Attribute {
  token: Token;
  name: string;
  args: Token[][];
}

const STAGES: readonly ShaderStage[] = ["vertex", "fragment", "compute"];
const OPENERS = new Set(["(", "[", "{"]);
const CLOSERS = new Set([")", "]", "}"]);
const INTEGER_LITERAL = /^([0-9]+)[iu]?$/;

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

export function reflectWgsl(source: string): ShaderReflection {
  return new ReflectionParser(significantTokens(tokenize(source))).parse();
}

/* =============================================================================
 * PARSER
 * ============================================================================= */

class ReflectionParser {
  private pos = 0;
  private readonly result: ShaderReflection = { structs: [], bindings: [], entryPoints: [] };

  constructor(private readonly tokens: readonly Token[]) {}

  parse(): ShaderReflection {
    while (!this.done()) {
      const attributes = this.attributes();
      const keyword = this.peek();
      if (keyword.kind === "ident" && keyword.text === "struct") {
        this.struct();
      } else if (keyword.kind === "ident" && keyword.text === "var") {
        this.variable(attributes);
      } else if (keyword.kind === "ident" && keyword.text === "fn") {
        this.function(attributes);
      } else {
        this.skipDeclaration();
      }
    }
    return this.result;
  }

  private struct(): void {
    this.next();
    const name = this.ident();
    this.expect("{");

    const members: StructMember[] = [];
    while (this.peek().text !== "}") {
      this.attributes();
      const memberName = this.ident();
      this.expect(":");
      members.push({ name: memberName, type: this.type([",", "}"]) });
      if (this.peek().text === ",") this.next();
    }
    this.expect("}");
    if (!this.done() && this.peek().text === ";") this.next();

    this.result.structs.push({ name, members });
  }

  private variable(attributes: Attribute[]): void {
    this.next();

    let addressSpace: string | null = null;
    let access: string | null = null;
    if (this.peek().text === "<") {
      this.next();
      addressSpace = this.ident();
      if (this.peek().text === ",") {
        this.next();
        access = this.ident();
      }
      this.expect(">");
    }

    const name = this.ident();
    let type = "";
    if (this.peek().text === ":") {
      this.next();
      type = this.type([";", "="]);
    }
    this.skipDeclaration();

    const group = findAttribute(attributes, "group");
    const binding = findAttribute(attributes, "binding");
    if (group && binding) {
      this.result.bindings.push({
        group: integerArgument(group),
        binding: integerArgument(binding),
        name,
        addressSpace,
        access,
        type,
      });
    }
  }

  private function(attributes: Attribute[]): void {
    this.next();
    const name = this.ident();

    // Signature up to the body; parameter and return attributes never hold a brace
    while (this.peek().text !== "{") this.next();
    this.skipBalanced();

    const stage = STAGES.find((s) => findAttribute(attributes, s));
    if (!stage) return;
    const workgroup = findAttribute(attributes, "workgroup_size");
    this.result.entryPoints.push({
      name,
      stage,
      workgroupSize: stage === "compute" && workgroup ? workgroup.args.map(workgroupDimension) : null,
    });
  }

  /* ---------------------------------------------------------------------------
   * Pieces
   * --------------------------------------------------------------------------- */

  private attributes(): Attribute[] {
    const attributes: Attribute[] = [];
    while (!this.done() && this.peek().kind === "attribute") {
      const token = this.next();
      const args: Token[][] = [];
      if (!this.done() && this.peek().text === "(") {
        this.next();
        let current: Token[] = [];
        let depth = 0;
        for (;;) {
          const t = this.next();
          if (depth === 0 && t.text === ")") break;
          if (depth === 0 && t.text === ",") {
            args.push(current);
            current = [];
            continue;
          }
          if (OPENERS.has(t.text)) depth++;
          if (CLOSERS.has(t.text)) depth--;
          current.push(t);
        }
        if (current.length > 0) args.push(current);
      }
      attributes.push({ token, name: token.text.slice(1), args });
    }
    return attributes;
  }

  /** Type tokens up to one of `stops` outside any template or bracket. */
  private type(stops: readonly string[]): string {
    const collected: Token[] = [];
    let depth = 0;
    for (;;) {
      const t = this.peek();
      if (depth === 0 && stops.includes(t.text)) break;
      this.next();
      depth += templateDelta(t.text);
      collected.push(t);
    }
    if (collected.length === 0) {
      throw new WgslSyntaxError("Expected a type", this.peek().line, this.peek().column);
    }
    return serializeTokens(collected);
  }

  /** Consume through the `;` ending a declaration, or a closing top-level brace. */
  private skipDeclaration(): void {
    let depth = 0;
    for (;;) {
      const t = this.next();
      if (OPENERS.has(t.text)) depth++;
      if (CLOSERS.has(t.text)) {
        depth--;
        if (depth < 0) throw new WgslSyntaxError(`Unexpected '${t.text}'`, t.line, t.column);
      }
      if (depth === 0 && (t.text === ";" || t.text === "}")) return;
    }
  }

  /** Consume a `{ ... }` block, nested blocks included. */
  private skipBalanced(): void {
    let depth = 0;
    do {
      const t = this.next();
      if (t.text === "{") depth++;
      if (t.text === "}") depth--;
    } while (depth > 0);
  }

  /* ---------------------------------------------------------------------------
   * Cursor
   * --------------------------------------------------------------------------- */

  private done(): boolean {
    return this.pos >= this.tokens.length;
  }

  private peek(): Token {
    const t = this.tokens[this.pos];
    if (!t) throw this.endOfInput();
    return t;
  }

  private next(): Token {
    const t = this.peek();
    this.pos++;
    return t;
  }

  private expect(text: string): Token {
    const t = this.next();
    if (t.text !== text) {
      throw new WgslSyntaxError(`Expected '${text}' but found '${t.text}'`, t.line, t.column);
    }
    return t;
  }

  private ident(): string {
    const t = this.next();
    if (t.kind !== "ident") {
      throw new WgslSyntaxError(`Expected an identifier but found '${t.text}'`, t.line, t.column);
    }
    return t.text;
  }

  private endOfInput(): WgslSyntaxError {
    const last = this.tokens[this.tokens.length - 1];
    return new WgslSyntaxError("Unexpected end of input", last?.line ?? 1, last?.column ?? 1);
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function findAttribute(attributes: readonly Attribute[], name: string): Attribute | undefined {
  return attributes.find((a) => a.name === name);
}

function integerArgument(attribute: Attribute): number {
  const [first] = attribute.args;
  if (!first || attribute.args.length !== 1) {
    throw new WgslSyntaxError(
      `@${attribute.name} takes exactly one argument`,
      attribute.token.line,
      attribute.token.column,
    );
  }
  return integerLiteral(first, attribute);
}

function integerLiteral(arg: readonly Token[], attribute: Attribute): number {
  const value = literalValue(arg);
  if (value === null) {
    throw new WgslSyntaxError(
      `@${attribute.name} arguments must be integer literals`,
      attribute.token.line,
      attribute.token.column,
    );
  }
  return value;
}

function workgroupDimension(arg: readonly Token[]): WorkgroupDimension {
  return literalValue(arg) ?? serializeTokens(arg);
}

function literalValue(arg: readonly Token[]): number | null {
  const [only] = arg;
  const match = only && arg.length === 1 ? INTEGER_LITERAL.exec(only.text) : null;
  return match?.[1] ? Number(match[1]) : null;
}

/** Net template/bracket nesting change of one type token. */
function templateDelta(text: string): number {
  switch (text) {
    case "<":
    case "(":
    case "[":
      return 1;
    case ">":
    case ")":
    case "]":
      return -1;
    case ">>":
      return -2;
    default:
      return 0;
  }
}
