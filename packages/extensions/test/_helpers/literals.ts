import ts from "typescript";

/**
 * Read back the `export const` initializers of a generated module as plain
 * values.
 */
export function exportedConstants(code: string): Map<string, unknown> {
  const file = ts.createSourceFile("generated.ts", code, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const constants = new Map<string, unknown>();
  for (const statement of file.statements) {
    if (!ts.isVariableStatement(statement)) continue;
    for (const decl of statement.declarationList.declarations) {
      if (ts.isIdentifier(decl.name) && decl.initializer) {
        constants.set(decl.name.text, literalValue(decl.initializer));
      }
    }
  }
  return constants;
}

function literalValue(node: ts.Expression): unknown {
  if (ts.isAsExpression(node)) return literalValue(node.expression);
  if (ts.isStringLiteral(node)) return node.text;
  if (ts.isNumericLiteral(node)) return Number(node.text);
  if (node.kind === ts.SyntaxKind.TrueKeyword) return true;
  if (node.kind === ts.SyntaxKind.FalseKeyword) return false;
  if (node.kind === ts.SyntaxKind.NullKeyword) return null;
  if (ts.isArrayLiteralExpression(node)) return node.elements.map(literalValue);
  if (ts.isObjectLiteralExpression(node)) {
    const value: Record<string, unknown> = {};
    for (const prop of node.properties) {
      if (!ts.isPropertyAssignment(prop)) throw new Error(`unexpected ${ts.SyntaxKind[prop.kind]}`);
      if (!ts.isIdentifier(prop.name) && !ts.isStringLiteral(prop.name)) {
        throw new Error(`unexpected key ${ts.SyntaxKind[prop.name.kind]}`);
      }
      value[prop.name.text] = literalValue(prop.initializer);
    }
    return value;
  }
  throw new Error(`unexpected ${ts.SyntaxKind[node.kind]}`);
}
