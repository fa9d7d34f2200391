/**
 * Best-effort callee resolution.
 *
 * A callee resolves when its root identifier is bound by an import, by a
 * `def`/`class`, or is a Python builtin that nothing shadows. Everything
 * else (locals, parameters, chains rooted in a call or subscript) stays
 * unresolved and the pattern catalog falls back to the written name.
 */

import builtinNames from "./builtins.json";
import { SyntaxNode, getField, getNodeText } from "./node-utils";
import { Scope, ScopeTable } from "./scopes";

const BUILTINS: ReadonlySet<string> = new Set<string>(builtinNames);

export function isBuiltinName(name: string): boolean {
  return BUILTINS.has(name);
}

/**
 * Callee text as written. Line breaks inside a chained call are dropped so
 * `session.query(A)\n    .filter(...)` reads as one expression.
 * Undefined for callees that are neither a name nor an attribute access.
 */
export function getCallName(callee: SyntaxNode, content: string): string | undefined {
  if (callee.type === "identifier") {
    return getNodeText(callee, content);
  }
  if (callee.type === "attribute") {
    return getNodeText(callee, content).replace(/\s*\\?\r?\n\s*/g, "");
  }
  return undefined;
}

/**
 * `a.b.c` -> ["a", "b", "c"]. Undefined when the chain is rooted in anything
 * but a plain name.
 */
export function getDottedChain(node: SyntaxNode, content: string): string[] | undefined {
  const chain: string[] = [];
  let current = node;
  while (current.type === "attribute") {
    const object = getField(current, "object");
    const attribute = getField(current, "attribute");
    if (!object || !attribute) return undefined;
    chain.unshift(getNodeText(attribute, content));
    current = object;
  }
  if (current.type !== "identifier") return undefined;
  chain.unshift(getNodeText(current, content));
  return chain;
}

export class NameResolver {
  constructor(
    private readonly scopes: ScopeTable,
    private readonly content: string
  ) {}

  /** Fully-qualified dotted name a dotted chain refers to from `scope`. */
  resolveChain(chain: readonly string[], scope: Scope): string | undefined {
    const [root, ...rest] = chain;
    if (root === undefined) return undefined;

    const site = this.scopes.lookup(root, scope);
    let base: string | undefined;
    if (site) {
      if (site.kind === "import" || site.kind === "definition") {
        base = site.qualifiedName;
      }
    } else if (isBuiltinName(root)) {
      base = `builtins.${root}`;
    }

    if (base === undefined) return undefined;
    return rest.length > 0 ? `${base}.${rest.join(".")}` : base;
  }

  /** Resolve the callee expression of a `call` node. */
  resolveCallee(callee: SyntaxNode, scope: Scope): string | undefined {
    const chain = getDottedChain(callee, this.content);
    return chain ? this.resolveChain(chain, scope) : undefined;
  }
}
