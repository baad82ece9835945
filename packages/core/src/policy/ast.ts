/**
 * Narrowing helpers for node-sql-parser ASTs, which are loosely shaped
 * and change between parser releases.
 */

export type AstNode = { [key: string]: unknown };

export function isNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read an identifier that the parser gives either as a plain string or
 * as `{ type, value }` (v5 wraps names this way).
 */
export function identValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (isNode(value)) {
    if (typeof value.value === 'string') return value.value;
    if (isNode(value.expr)) return identValue(value.expr);
  }
  return undefined;
}

/** Function names are `string` in older releases and `{ name: [{ value }] }` in v5. */
export function functionName(node: AstNode): string | undefined {
  const name = node.name;
  if (typeof name === 'string') return name;
  if (isNode(name) && Array.isArray(name.name)) {
    const parts = name.name.map(identValue).filter((p): p is string => p !== undefined);
    return parts.length > 0 ? parts[parts.length - 1] : undefined;
  }
  return undefined;
}

export function walkAst(node: unknown, visitor: (n: AstNode) => void): void {
  if (Array.isArray(node)) {
    for (const item of node) walkAst(item, visitor);
    return;
  }
  if (!isNode(node)) return;

  visitor(node);
  for (const key of Object.keys(node)) {
    walkAst(node[key], visitor);
  }
}
