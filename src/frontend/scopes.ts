/**
 * Lexical scope table for a parsed module.
 *
 * Python scoping is per function, not per block, so a scope is the module,
 * a `def` or a `lambda`. Class bodies are namespaces that nested functions
 * cannot see; their bindings are dropped and methods hang off the scope
 * enclosing the class. Comprehension variables are folded into the
 * enclosing scope.
 */

import { ParsedModule } from "./parser";
import {
  SyntaxNode,
  getDefinitionName,
  getField,
  getNodeText,
  nodeKey,
} from "./node-utils";

export type BindingKind = "import" | "definition" | "variable" | "parameter";

export interface BindingSite {
  readonly kind: BindingKind;
  /** The identifier that introduces the name. */
  readonly node: SyntaxNode;
  /** Right-hand side for a plain `name = value` assignment. */
  readonly value?: SyntaxNode;
  /** Import target or definition qualname. Missing when it cannot be anchored. */
  readonly qualifiedName?: string;
  /** `name += value` rebinds but needs an earlier binding. */
  readonly augmented: boolean;
}

export type ScopeKind = "module" | "function" | "lambda";

export class Scope {
  private readonly sites = new Map<string, BindingSite[]>();
  private readonly globals = new Set<string>();
  private readonly nonlocals = new Set<string>();

  constructor(
    readonly node: SyntaxNode,
    readonly kind: ScopeKind,
    readonly name: string,
    readonly qualifiedName: string,
    readonly parent?: Scope
  ) {}

  addBinding(name: string, site: BindingSite): void {
    const existing = this.sites.get(name);
    if (existing) {
      existing.push(site);
    } else {
      this.sites.set(name, [site]);
    }
  }

  declareGlobal(name: string): void {
    this.globals.add(name);
  }

  declareNonlocal(name: string): void {
    this.nonlocals.add(name);
  }

  isDeclaredGlobal(name: string): boolean {
    return this.globals.has(name);
  }

  isDeclaredNonlocal(name: string): boolean {
    return this.nonlocals.has(name);
  }

  /** All binding sites of `name` in this scope, in source order. */
  bindingsOf(name: string): readonly BindingSite[] {
    return this.sites.get(name) ?? [];
  }

  /** The first binding that introduces `name` here (augmented sites excluded). */
  firstBinding(name: string): BindingSite | undefined {
    return this.bindingsOf(name).find((site) => !site.augmented);
  }
}

/**
 * One entry of a `parameters` / `lambda_parameters` list.
 */
export interface ParameterNode {
  readonly nameNode: SyntaxNode;
  readonly annotation?: SyntaxNode;
  readonly defaultValue?: SyntaxNode;
}

function splatIdentifier(node: SyntaxNode): SyntaxNode | undefined {
  return node.namedChildren.find((child) => child.type === "identifier");
}

/**
 * Named parameters in declaration order. Bare `*` and `/` separators and
 * tuple parameters are skipped; splat parameters are reported by name.
 */
export function listParameters(parameters: SyntaxNode | undefined): ParameterNode[] {
  if (!parameters) return [];

  const result: ParameterNode[] = [];
  for (const param of parameters.namedChildren) {
    switch (param.type) {
      case "identifier":
        result.push({ nameNode: param });
        break;
      case "list_splat_pattern":
      case "dictionary_splat_pattern": {
        const id = splatIdentifier(param);
        if (id) result.push({ nameNode: id });
        break;
      }
      case "typed_parameter": {
        const target = param.namedChildren.find((child) => child.type !== "type");
        const annotation = getField(param, "type");
        if (!target) break;
        const id = target.type === "identifier" ? target : splatIdentifier(target);
        if (id) result.push({ nameNode: id, annotation });
        break;
      }
      case "default_parameter":
      case "typed_default_parameter": {
        const name = getField(param, "name");
        if (name && name.type === "identifier") {
          result.push({
            nameNode: name,
            annotation: getField(param, "type"),
            defaultValue: getField(param, "value"),
          });
        }
        break;
      }
      default:
        break;
    }
  }
  return result;
}

/**
 * Identifiers bound by an assignment target (`a`, `a, b`, `[a, *b]`).
 * Attribute and subscript targets bind nothing.
 */
export function collectTargetNames(target: SyntaxNode): SyntaxNode[] {
  switch (target.type) {
    case "identifier":
      return [target];
    case "pattern_list":
    case "tuple_pattern":
    case "list_pattern":
    case "expression_list":
    case "tuple":
    case "list":
    case "parenthesized_expression":
    case "list_splat_pattern":
    case "list_splat":
      return target.namedChildren.flatMap(collectTargetNames);
    default:
      return [];
  }
}

/** Dotted name text without the whitespace Python allows around dots. */
export function dottedText(node: SyntaxNode, content: string): string {
  return getNodeText(node, content).replace(/\s+/g, "");
}

/**
 * Absolute module path of a relative import, anchored at the importing
 * module's dotted name. Undefined when the package cannot be determined.
 */
export function resolveRelativeModule(moduleText: string, moduleName: string): string | undefined {
  const match = /^(\.+)(.*)$/.exec(moduleText);
  if (!match) return moduleText;

  const level = match[1].length;
  const rest = match[2];
  const packageParts = moduleName.split(".").slice(0, -1);
  if (packageParts.length === 0) return undefined;

  const keep = packageParts.length - (level - 1);
  if (keep <= 0) return undefined;

  const anchor = packageParts.slice(0, keep).join(".");
  return rest ? `${anchor}.${rest}` : anchor;
}

interface CollectTask {
  readonly node: SyntaxNode;
  /** Innermost function/module scope, parent of any new scope */
  readonly scope: Scope;
  /** Where bindings go; null inside class bodies */
  readonly into: Scope | null;
  /** Qualname prefix for definitions at this point */
  readonly qualifier: string;
}

export class ScopeTable {
  readonly moduleScope: Scope;
  private readonly scopes = new Map<string, Scope>();

  constructor(private readonly module: ParsedModule) {
    this.moduleScope = new Scope(module.root, "module", module.moduleName, module.moduleName);
    this.scopes.set(nodeKey(module.root), this.moduleScope);

    const stack: CollectTask[] = [];
    const push = (tasks: CollectTask[]): void => {
      for (let i = tasks.length - 1; i >= 0; i--) stack.push(tasks[i]);
    };
    push(
      module.root.children.map((node) => ({
        node,
        scope: this.moduleScope,
        into: this.moduleScope,
        qualifier: module.moduleName,
      }))
    );
    while (stack.length > 0) {
      const task = stack.pop();
      if (!task) break;
      push(this.collect(task));
    }
  }

  /** Scope introduced by a module, `def` or `lambda` node. */
  scopeFor(node: SyntaxNode): Scope | undefined {
    return this.scopes.get(nodeKey(node));
  }

  /**
   * Find the binding `name` refers to from inside `from`, following
   * `global`/`nonlocal` declarations and the enclosing-scope chain.
   */
  lookup(name: string, from: Scope): BindingSite | undefined {
    let current: Scope | undefined = from;
    while (current) {
      if (current !== this.moduleScope && current.isDeclaredGlobal(name)) {
        current = this.moduleScope;
        continue;
      }
      if (!current.isDeclaredNonlocal(name)) {
        const site = current.firstBinding(name);
        if (site) return site;
      }
      current = current.parent;
    }
    return undefined;
  }

  private get content(): string {
    return this.module.source;
  }

  private bind(into: Scope | null, nameNode: SyntaxNode, site: Omit<BindingSite, "node">): void {
    if (!into) return;
    into.addBinding(getNodeText(nameNode, this.content), { node: nameNode, ...site });
  }

  private bindTargets(into: Scope | null, target: SyntaxNode, value?: SyntaxNode): void {
    const names = collectTargetNames(target);
    const plainValue = target.type === "identifier" ? value : undefined;
    for (const nameNode of names) {
      this.bind(into, nameNode, { kind: "variable", value: plainValue, augmented: false });
    }
  }

  /**
   * Record what `task.node` binds and return the subtrees still to visit,
   * in source order.
   */
  private collect(task: CollectTask): CollectTask[] {
    const { node, scope, into, qualifier } = task;
    switch (node.type) {
      case "function_definition":
        return this.collectFunction(task);

      case "lambda":
        return this.collectLambda(task);

      case "class_definition": {
        const nameNode = getField(node, "name");
        const className = getDefinitionName(node, this.content) ?? "<class>";
        if (nameNode) {
          this.bind(into, nameNode, {
            kind: "definition",
            qualifiedName: `${qualifier}.${className}`,
            augmented: false,
          });
        }
        const next: CollectTask[] = [];
        const superclasses = getField(node, "superclasses");
        if (superclasses) next.push({ ...task, node: superclasses });
        const body = getField(node, "body");
        if (body) next.push({ node: body, scope, into: null, qualifier: `${qualifier}.${className}` });
        return next;
      }

      case "import_statement":
        this.collectImport(node, into);
        return [];

      case "import_from_statement":
        this.collectImportFrom(node, into);
        return [];

      case "assignment": {
        const left = getField(node, "left");
        const right = getField(node, "right");
        if (left) this.bindTargets(into, left, right);
        break;
      }

      case "augmented_assignment": {
        const left = getField(node, "left");
        if (left && left.type === "identifier") {
          this.bind(into, left, { kind: "variable", augmented: true });
        }
        break;
      }

      case "for_statement":
      case "for_in_clause": {
        const left = getField(node, "left");
        if (left) this.bindTargets(into, left);
        break;
      }

      case "named_expression": {
        const name = getField(node, "name");
        if (name) {
          this.bind(into, name, { kind: "variable", value: getField(node, "value"), augmented: false });
        }
        break;
      }

      case "as_pattern_target":
        for (const id of node.namedChildren.flatMap(collectTargetNames)) {
          this.bind(into, id, { kind: "variable", augmented: false });
        }
        break;

      case "except_clause": {
        // `except E as e` in grammars without as_pattern
        const children = node.children;
        for (let i = 1; i < children.length; i++) {
          if (children[i - 1].type === "as" && children[i].type === "identifier") {
            this.bind(into, children[i], { kind: "variable", augmented: false });
          }
        }
        break;
      }

      case "global_statement":
        for (const id of node.namedChildren) {
          if (id.type === "identifier") scope.declareGlobal(getNodeText(id, this.content));
        }
        return [];

      case "nonlocal_statement":
        for (const id of node.namedChildren) {
          if (id.type === "identifier") scope.declareNonlocal(getNodeText(id, this.content));
        }
        return [];

      default:
        break;
    }

    return node.children.map((child) => ({ ...task, node: child }));
  }

  /** Annotations and defaults are evaluated in the enclosing scope. */
  private parameterExpressions(params: ParameterNode[], task: CollectTask): CollectTask[] {
    const next: CollectTask[] = [];
    for (const param of params) {
      if (param.annotation) next.push({ ...task, node: param.annotation });
      if (param.defaultValue) next.push({ ...task, node: param.defaultValue });
    }
    return next;
  }

  private collectFunction(task: CollectTask): CollectTask[] {
    const { node, scope, into, qualifier } = task;
    const name = getDefinitionName(node, this.content) ?? "<function>";
    const nameNode = getField(node, "name");
    if (nameNode) {
      this.bind(into, nameNode, {
        kind: "definition",
        qualifiedName: `${qualifier}.${name}`,
        augmented: false,
      });
    }

    const params = listParameters(getField(node, "parameters"));
    const next = this.parameterExpressions(params, task);
    const returnType = getField(node, "return_type");
    if (returnType) next.push({ ...task, node: returnType });

    const fnScope = new Scope(node, "function", name, `${qualifier}.${name}`, scope);
    this.scopes.set(nodeKey(node), fnScope);
    for (const param of params) {
      this.bind(fnScope, param.nameNode, { kind: "parameter", augmented: false });
    }

    const body = getField(node, "body");
    if (body) next.push({ node: body, scope: fnScope, into: fnScope, qualifier: fnScope.qualifiedName });
    return next;
  }

  private collectLambda(task: CollectTask): CollectTask[] {
    const { node, scope, qualifier } = task;
    const params = listParameters(getField(node, "parameters"));
    const next = this.parameterExpressions(params, task);

    const lambdaScope = new Scope(node, "lambda", "<lambda>", `${qualifier}.<lambda>`, scope);
    this.scopes.set(nodeKey(node), lambdaScope);
    for (const param of params) {
      this.bind(lambdaScope, param.nameNode, { kind: "parameter", augmented: false });
    }

    const body = getField(node, "body");
    if (body) {
      next.push({ node: body, scope: lambdaScope, into: lambdaScope, qualifier: lambdaScope.qualifiedName });
    }
    return next;
  }

  private collectImport(node: SyntaxNode, into: Scope | null): void {
    for (const item of node.namedChildren) {
      if (item.type === "dotted_name") {
        // `import a.b.c` binds `a`
        const root = item.namedChildren[0] ?? item;
        const rootName = getNodeText(root, this.content);
        this.bind(into, root, { kind: "import", qualifiedName: rootName, augmented: false });
      } else if (item.type === "aliased_import") {
        const name = getField(item, "name");
        const alias = getField(item, "alias");
        if (name && alias) {
          this.bind(into, alias, {
            kind: "import",
            qualifiedName: dottedText(name, this.content),
            augmented: false,
          });
        }
      }
    }
  }

  private collectImportFrom(node: SyntaxNode, into: Scope | null): void {
    const moduleNode = getField(node, "module_name");
    if (!moduleNode) return;

    const moduleText = dottedText(moduleNode, this.content);
    const resolvedModule = resolveRelativeModule(moduleText, this.module.moduleName);
    const moduleKey = nodeKey(moduleNode);

    for (const item of node.namedChildren) {
      if (nodeKey(item) === moduleKey) continue;

      let nameNode: SyntaxNode | undefined;
      let boundNode: SyntaxNode | undefined;
      if (item.type === "dotted_name") {
        nameNode = item;
        boundNode = item;
      } else if (item.type === "aliased_import") {
        nameNode = getField(item, "name");
        boundNode = getField(item, "alias");
      }
      if (!nameNode || !boundNode) continue;

      const importedName = dottedText(nameNode, this.content);
      this.bind(into, boundNode, {
        kind: "import",
        qualifiedName: resolvedModule ? `${resolvedModule}.${importedName}` : undefined,
        augmented: false,
      });
    }
  }
}
