/**
 * Binding Codegen
 *
 * Turns a compiled WGSL artifact into a TypeScript module of `as const`
 * descriptors a renderer can build pipelines and bind group layouts from:
 *
 * ```typescript
 * // Generated by shaderweave from dist/shaders/package_8_lighting_3_pbr.wgsl
 * export const SOURCE = "struct Camera { ... }";
 * export const ENTRY_POINTS = [{ name: "main", stage: "fragment", workgroupSize: null }] as const;
 * export const BIND_GROUPS = [{ group: 0, bindings: [{ binding: 0, name: "camera", ... }] }] as const;
 * export const STRUCTS = [{ name: "Camera", module: "package", wgslName: "Camera", members: [...] }] as const;
 * ```
 *
 * Struct names are run through a demangler so that a compiler emitting
 * mangled declarations still yields readable names and their home module.
 */

import ts from "typescript";
import { unmangleOrRoot, type ModulePath } from "@shaderweave/core";
import { CodegenError, WgslSyntaxError } from "../errors.js";
import { reflectWgsl, type ShaderReflection } from "../wgsl/reflect.js";
import { isValidIdentifier } from "./identifier.js";

export interface CodegenOptions {
  /** Embed the artifact text as `SOURCE` (default: true) */
  includeSource: boolean;
}

export const DEFAULT_CODEGEN_OPTIONS: CodegenOptions = {
  includeSource: true,
};

/** Maps a declared name back to its module and item name. */
export type Demangler = (name: string) => { path: ModulePath; name: string };

type LiteralValue = string | number | boolean | null | readonly LiteralValue[] | { readonly [key: string]: LiteralValue };

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Generate the binding module for one artifact.
 *
 * @param sourceRef - where the artifact lives; used in the header and in errors
 */
export function generateBindings(
  source: string,
  sourceRef: string,
  options: Partial<CodegenOptions> = {},
  demangle: Demangler = unmangleOrRoot,
): string {
  const { includeSource } = { ...DEFAULT_CODEGEN_OPTIONS, ...options };

  let reflection: ShaderReflection;
  try {
    reflection = reflectWgsl(source);
  } catch (error) {
    if (error instanceof WgslSyntaxError) {
      throw new CodegenError(error.reason, sourceRef, error.line, error.column, error);
    }
    throw error;
  }

  const statements: ts.Statement[] = [];
  if (includeSource) {
    statements.push(exportConst("SOURCE", ts.factory.createStringLiteral(source), false));
  }
  statements.push(
    exportConst("ENTRY_POINTS", toExpression(entryPoints(reflection))),
    exportConst("BIND_GROUPS", toExpression(bindGroups(reflection))),
    exportConst("STRUCTS", toExpression(structs(reflection, demangle))),
  );

  return `// Generated by shaderweave from ${sourceRef}\n\n${printStatements(statements)}`;
}

/* =============================================================================
 * DESCRIPTORS
 * ============================================================================= */

function entryPoints(reflection: ShaderReflection): LiteralValue {
  return reflection.entryPoints.map((e) => ({
    name: e.name,
    stage: e.stage,
    workgroupSize: e.workgroupSize,
  }));
}

function bindGroups(reflection: ShaderReflection): LiteralValue {
  const groups = [...new Set(reflection.bindings.map((b) => b.group))].sort((a, b) => a - b);
  return groups.map((group) => ({
    group,
    bindings: reflection.bindings
      .filter((b) => b.group === group)
      .sort((a, b) => a.binding - b.binding)
      .map((b) => ({
        binding: b.binding,
        name: b.name,
        addressSpace: b.addressSpace,
        access: b.access,
        type: b.type,
      })),
  }));
}

function structs(reflection: ShaderReflection, demangle: Demangler): LiteralValue {
  return reflection.structs.map((s) => {
    const { path, name } = demangle(s.name);
    return {
      name,
      module: path.toString(),
      wgslName: s.name,
      members: s.members.map((m) => ({ name: m.name, type: m.type })),
    };
  });
}

/* =============================================================================
 * AST
 * ============================================================================= */

function toExpression(value: LiteralValue): ts.Expression {
  const f = ts.factory;
  if (value === null) return f.createNull();
  if (typeof value === "string") return f.createStringLiteral(value);
  if (typeof value === "number") return f.createNumericLiteral(value);
  if (typeof value === "boolean") return value ? f.createTrue() : f.createFalse();
  if (isLiteralArray(value)) {
    return f.createArrayLiteralExpression(value.map(toExpression), value.length > 0);
  }
  const properties = Object.entries(value).map(([key, v]) =>
    f.createPropertyAssignment(
      isValidIdentifier(key) ? f.createIdentifier(key) : f.createStringLiteral(key),
      toExpression(v),
    ),
  );
  return f.createObjectLiteralExpression(properties, true);
}

function isLiteralArray(value: LiteralValue): value is readonly LiteralValue[] {
  return Array.isArray(value);
}

function exportConst(name: string, initializer: ts.Expression, asConst = true): ts.Statement {
  const f = ts.factory;
  const value = asConst
    ? f.createAsExpression(initializer, f.createTypeReferenceNode(f.createIdentifier("const")))
    : initializer;
  return f.createVariableStatement(
    [f.createModifier(ts.SyntaxKind.ExportKeyword)],
    f.createVariableDeclarationList(
      [f.createVariableDeclaration(name, undefined, undefined, value)],
      ts.NodeFlags.Const,
    ),
  );
}

function printStatements(statements: readonly ts.Statement[]): string {
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const file = ts.factory.updateSourceFile(
    ts.createSourceFile("bindings.ts", "", ts.ScriptTarget.Latest, false, ts.ScriptKind.TS),
    statements,
  );
  return printer.printFile(file);
}
