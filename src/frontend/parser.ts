/**
 * Python front-end using tree-sitter.
 *
 * tree-sitter never throws on bad input: it recovers and marks the damage
 * with ERROR nodes and zero-width "missing" tokens. Any such node makes the
 * whole parse fail here, so no partial results reach the extractor. The
 * grammar also accepts Python 2 forms that Python 3 rejects; those fail too.
 */

import * as fs from "fs";
import * as path from "path";
import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { PythonSyntaxError, SourceNotFoundError, UsageError } from "../errors";
import { logger } from "../logger";
import { SyntaxNode, getLineNumber, getNodeText } from "./node-utils";

/**
 * Input for a single analysis run. Exactly one of `source` or `filePath`.
 */
export interface SourceInput {
  source?: string;
  filePath?: string;
  /**
   * Dotted module name used to qualify local definitions and to anchor
   * relative imports (e.g. "shop.orders.views").
   * Defaults to the file stem, or "__main__" for raw source.
   */
  moduleName?: string;
}

export interface ParsedModule {
  readonly root: SyntaxNode;
  readonly source: string;
  readonly lines: readonly string[];
  readonly filePath?: string;
  readonly moduleName: string;
}

/** tree-sitter's default input buffer, in UTF-16 code units. */
const MIN_BUFFER_SIZE = 32 * 1024;

/** Statements and tokens that only exist in Python 2. */
const PYTHON2_NODE_TYPES = new Set(["print_statement", "exec_statement", "<>"]);

/** Decimal literal with a leading zero (`0777`), or a long suffix (`10L`). */
const PYTHON2_INTEGER = /^0[0-9_]*[1-9]|[lL]$/;

let sharedParser: Parser | null = null;

function getParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    sharedParser.setLanguage(Python);
  }
  return sharedParser;
}

function readSourceFile(filePath: string): string {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch {
    throw new SourceNotFoundError(filePath);
  }
  if (!stat.isFile()) {
    throw new SourceNotFoundError(filePath);
  }

  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    logger.debug("Failed to read source file", {
      error: error instanceof Error ? error.message : String(error),
    });
    throw new SourceNotFoundError(filePath);
  }
}

function isPython2Only(node: SyntaxNode, source: string): boolean {
  if (PYTHON2_NODE_TYPES.has(node.type)) {
    return true;
  }
  if (node.type === "integer") {
    const text = getNodeText(node, source);
    return !/[jJ]$/.test(text) && PYTHON2_INTEGER.test(text);
  }
  if (node.type === "except_clause") {
    // `except E, e:`
    return node.children.some((child) => child.type === "," || child.type === "expression_list");
  }
  return false;
}

/**
 * First ERROR node, missing token or Python 2 construct in document order,
 * if any.
 */
export function findSyntaxError(root: SyntaxNode, source: string): SyntaxNode | null {
  if (root.type === "ERROR") {
    return root;
  }
  const stack: SyntaxNode[] = [...root.children].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === "ERROR") {
      return node;
    }
    if (node.childCount === 0 && node.startIndex === node.endIndex) {
      return node;
    }
    if (isPython2Only(node, source)) {
      return node;
    }

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}

/**
 * Line of the first backtick outside strings and comments. Backtick repr
 * was removed in Python 3.
 */
export function findBacktick(root: SyntaxNode, source: string): number | undefined {
  const quoted: Array<[number, number]> = [];
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === "string" || node.type === "comment") {
      quoted.push([node.startIndex, node.endIndex]);
      continue;
    }
    stack.push(...node.children);
  }

  let index = source.indexOf("`");
  while (index !== -1) {
    const at = index;
    if (!quoted.some(([start, end]) => at >= start && at < end)) {
      return source.slice(0, at).split("\n").length;
    }
    index = source.indexOf("`", index + 1);
  }
  return undefined;
}

function defaultModuleName(filePath: string | undefined): string {
  if (!filePath) return "__main__";
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Parse one unit of Python source.
 *
 * @throws UsageError when both or neither of source/filePath are given
 * @throws SourceNotFoundError when filePath cannot be read
 * @throws PythonSyntaxError when the text does not parse
 */
export function parsePython(input: SourceInput): ParsedModule {
  const hasSource = input.source !== undefined;
  const hasPath = input.filePath !== undefined;

  if (hasSource && hasPath) {
    throw new UsageError("Provide either source or filePath, not both");
  }
  if (!hasSource && !hasPath) {
    throw new UsageError("Either source or filePath must be provided");
  }

  const rawSource = input.filePath !== undefined ? readSourceFile(input.filePath) : input.source ?? "";
  const source = rawSource.charCodeAt(0) === 0xfeff ? rawSource.slice(1) : rawSource;

  const tree = getParser().parse(source, undefined, {
    bufferSize: Math.max(MIN_BUFFER_SIZE, source.length + 1),
  });
  const errorNode = findSyntaxError(tree.rootNode, source);
  if (errorNode) {
    throw new PythonSyntaxError(getLineNumber(errorNode));
  }
  const backtickLine = source.includes("`") ? findBacktick(tree.rootNode, source) : undefined;
  if (backtickLine !== undefined) {
    throw new PythonSyntaxError(backtickLine);
  }

  return {
    root: tree.rootNode,
    source,
    lines: source.split(/\r?\n/),
    filePath: input.filePath,
    moduleName: input.moduleName ?? defaultModuleName(input.filePath),
  };
}
