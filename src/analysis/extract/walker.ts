/**
 * Context-tracking depth-first walk shared by the extraction passes.
 *
 * Each pass walks the tree on its own and picks the node kinds it cares
 * about; the walker only keeps the context straight:
 * - `def` and `lambda` bodies get their own function name and async flag
 *   (a plain `def` inside an `async def` is not async);
 * - decorators, parameter defaults and annotations stay in the outer context;
 * - a `for` iterable and the first iterable of a comprehension are evaluated
 *   once and stay outside the loop, as does a loop's `else` clause;
 * - loop depth is a counter and carries across function boundaries.
 *
 * Loops are numbered in visit order, so every pass sees the same index for
 * the same loop.
 */

import { ParsedModule } from "../../frontend/parser";
import { Scope, ScopeTable } from "../../frontend/scopes";
import {
  SyntaxNode,
  getDefinitionName,
  getField,
  isAsyncFunction,
  nodeKey,
} from "../../frontend/node-utils";
import { LoopType } from "../types";

export interface WalkFrame {
  readonly functionName?: string;
  readonly isAsync: boolean;
  readonly loopDepth: number;
  /** Index of the innermost enclosing loop */
  readonly loopIndex?: number;
  readonly loopNode?: SyntaxNode;
  readonly scope: Scope;
}

export interface LoopEntry {
  readonly index: number;
  readonly type: LoopType;
}

export interface Visit {
  readonly node: SyntaxNode;
  /** Context the node itself is evaluated in */
  readonly frame: WalkFrame;
  /** Set when the node is a loop */
  readonly loop?: LoopEntry;
}

export type Visitor = (visit: Visit) => void;

const COMPREHENSION_TYPES = new Set([
  "list_comprehension",
  "set_comprehension",
  "dictionary_comprehension",
  "generator_expression",
]);

/** Node types the walker treats as loops. */
export function loopTypeOf(node: SyntaxNode): LoopType | undefined {
  if (node.type === "for_statement") return "for";
  if (node.type === "while_statement") return "while";
  if (COMPREHENSION_TYPES.has(node.type)) return "comprehension";
  return undefined;
}

interface Task {
  readonly node: SyntaxNode;
  readonly frame: WalkFrame;
  /** Set on a comprehension's first `for` clause: the frame its iterable is evaluated in */
  readonly iterableFrame?: WalkFrame;
}

class Walker {
  private loopCount = 0;
  private readonly stack: Task[] = [];

  constructor(
    private readonly module: ParsedModule,
    private readonly scopes: ScopeTable,
    private readonly visitor: Visitor
  ) {}

  run(): void {
    const frame: WalkFrame = {
      isAsync: false,
      loopDepth: 0,
      scope: this.scopes.moduleScope,
    };
    this.pushChildren(this.module.root.children.map((node) => ({ node, frame })));

    while (this.stack.length > 0) {
      const task = this.stack.pop();
      if (!task) break;
      this.step(task);
    }
  }

  /** Children are pushed in reverse so they pop in source order. */
  private pushChildren(tasks: Task[]): void {
    for (let i = tasks.length - 1; i >= 0; i--) {
      this.stack.push(tasks[i]);
    }
  }

  private step({ node, frame, iterableFrame }: Task): void {
    const loopType = loopTypeOf(node);
    if (loopType) {
      this.enterLoop(node, loopType, frame);
      return;
    }

    this.visitor({ node, frame });

    if (node.type === "function_definition" || node.type === "lambda") {
      this.enterFunction(node, frame);
      return;
    }
    if (iterableFrame) {
      // everything after `in` is the outermost iterable
      let afterIn = false;
      const tasks: Task[] = [];
      for (const part of node.children) {
        tasks.push({ node: part, frame: afterIn ? iterableFrame : frame });
        if (part.type === "in") afterIn = true;
      }
      this.pushChildren(tasks);
      return;
    }

    this.pushChildren(node.children.map((child) => ({ node: child, frame })));
  }

  private enterFunction(node: SyntaxNode, frame: WalkFrame): void {
    const isLambda = node.type === "lambda";
    const inner: WalkFrame = {
      functionName: isLambda ? "<lambda>" : getDefinitionName(node, this.module.source),
      isAsync: isLambda ? false : isAsyncFunction(node),
      loopDepth: frame.loopDepth,
      loopIndex: frame.loopIndex,
      loopNode: frame.loopNode,
      scope: this.scopes.scopeFor(node) ?? frame.scope,
    };

    const body = getField(node, "body");
    const bodyKey = body ? nodeKey(body) : undefined;
    this.pushChildren(
      node.children.map((child) => ({ node: child, frame: nodeKey(child) === bodyKey ? inner : frame }))
    );
  }

  private enterLoop(node: SyntaxNode, type: LoopType, frame: WalkFrame): void {
    const index = this.loopCount++;
    this.visitor({ node, frame, loop: { index, type } });

    const inner: WalkFrame = {
      ...frame,
      loopDepth: frame.loopDepth + 1,
      loopIndex: index,
      loopNode: node,
    };

    if (type === "comprehension") {
      this.enterComprehension(node, frame, inner);
      return;
    }

    const outsideKeys = new Set<string>();
    const alternative = getField(node, "alternative");
    if (alternative) outsideKeys.add(nodeKey(alternative));
    if (type === "for") {
      const iterable = getField(node, "right");
      if (iterable) outsideKeys.add(nodeKey(iterable));
    }

    this.pushChildren(
      node.children.map((child) => ({ node: child, frame: outsideKeys.has(nodeKey(child)) ? frame : inner }))
    );
  }

  private enterComprehension(node: SyntaxNode, frame: WalkFrame, inner: WalkFrame): void {
    const tasks: Task[] = [];
    let seenFirstClause = false;
    for (const child of node.children) {
      if (child.type !== "for_in_clause" || seenFirstClause) {
        tasks.push({ node: child, frame: inner });
        continue;
      }

      seenFirstClause = true;
      tasks.push({ node: child, frame: inner, iterableFrame: frame });
    }
    this.pushChildren(tasks);
  }
}

export function walkModule(module: ParsedModule, scopes: ScopeTable, visitor: Visitor): void {
  new Walker(module, scopes, visitor).run();
}
