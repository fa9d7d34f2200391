import { ParsedModule } from "../../frontend/parser";
import { BindingSite, ScopeTable } from "../../frontend/scopes";
import {
  SyntaxNode,
  getEndLineNumber,
  getField,
  getLineNumber,
  getNodeText,
  isWithin,
} from "../../frontend/node-utils";
import { ConcatenationInfo, GlobalStatementInfo, TryStatementInfo } from "../types";
import { WalkFrame, walkModule } from "./walker";

const STRING_METHODS_RETURNING_STR = new Set(["format", "join"]);

/**
 * Whether an expression evidently produces a str: literals, f-strings,
 * `str(...)`, `"...".format(...)`, `"".join(...)`, and `+`/`%` built on one.
 */
export function isStringExpression(node: SyntaxNode, content: string): boolean {
  // every pending candidate can make the whole expression a str
  const pending: SyntaxNode[] = [node];
  while (pending.length > 0) {
    const current = pending.pop();
    if (!current) break;

    switch (current.type) {
      case "string":
      case "concatenated_string":
        return true;

      case "parenthesized_expression": {
        const inner = current.namedChildren[0];
        if (inner) pending.push(inner);
        break;
      }

      case "assignment": {
        const right = getField(current, "right");
        if (right) pending.push(right);
        break;
      }

      case "call": {
        const callee = getField(current, "function");
        if (!callee) break;
        if (callee.type === "identifier") {
          if (getNodeText(callee, content) === "str") return true;
          break;
        }
        if (callee.type === "attribute") {
          const object = getField(callee, "object");
          const attribute = getField(callee, "attribute");
          if (object && attribute && STRING_METHODS_RETURNING_STR.has(getNodeText(attribute, content))) {
            pending.push(object);
          }
        }
        break;
      }

      case "binary_operator": {
        const operator = getField(current, "operator");
        const left = getField(current, "left");
        const right = getField(current, "right");
        const op = operator ? getNodeText(operator, content) : "";
        if (op === "+") {
          if (right) pending.push(right);
          if (left) pending.push(left);
        } else if (op === "%" && left) {
          pending.push(left);
        }
        break;
      }

      default:
        break;
    }
  }
  return false;
}

/** The loop a statement repeats in, if that loop belongs to the statement's own scope. */
function loopInOwnScope(frame: WalkFrame): SyntaxNode | undefined {
  const loop = frame.loopNode;
  if (!loop) return undefined;
  return isWithin(loop, frame.scope.node) ? loop : undefined;
}

interface ConcatenationSite {
  node: SyntaxNode;
  target: SyntaxNode;
  /** Appended value */
  value: SyntaxNode;
  form: ConcatenationInfo["form"];
}

function readConcatenation(node: SyntaxNode, content: string): ConcatenationSite | undefined {
  const left = getField(node, "left");
  const right = getField(node, "right");
  if (!left || !right) return undefined;

  if (node.type === "augmented_assignment") {
    const operator = getField(node, "operator");
    if (!operator || getNodeText(operator, content) !== "+=") return undefined;
    return { node, target: left, value: right, form: "augmented" };
  }

  if (node.type === "assignment" && right.type === "binary_operator") {
    const operator = getField(right, "operator");
    const operand = getField(right, "left");
    const appended = getField(right, "right");
    if (
      operator &&
      operand &&
      appended &&
      getNodeText(operator, content) === "+" &&
      getNodeText(operand, content) === getNodeText(left, content)
    ) {
      return { node, target: left, value: appended, form: "rebinding" };
    }
  }
  return undefined;
}

/**
 * `s += x` and `s = s + x` sites, with whether they repeat inside a loop on
 * a variable that outlives the loop, and whether the variable holds a str.
 */
export function extractConcatenations(module: ParsedModule, scopes: ScopeTable): ConcatenationInfo[] {
  const content = module.source;
  const concatenations: ConcatenationInfo[] = [];

  walkModule(module, scopes, ({ node, frame }) => {
    if (node.type !== "augmented_assignment" && node.type !== "assignment") return;
    const site = readConcatenation(node, content);
    if (!site) return;

    const loop = loopInOwnScope(frame);
    const targetText = getNodeText(site.target, content);

    let definedOutsideLoop = true;
    let outsideSites: readonly BindingSite[] = [];
    if (loop && site.target.type === "identifier") {
      const scope = frame.scope;
      if (!scope.isDeclaredGlobal(targetText) && !scope.isDeclaredNonlocal(targetText)) {
        const introductions = scope.bindingsOf(targetText).filter((binding) => !binding.augmented);
        outsideSites = introductions.filter(
          (binding) => !isWithin(binding.node, loop) && binding.node.startIndex < loop.startIndex
        );
        // a name only ever introduced inside the loop starts over each iteration
        definedOutsideLoop = introductions.length === 0 || outsideSites.length > 0;
      }
    }

    const isStringValued =
      isStringExpression(site.value, content) ||
      outsideSites.some((binding) => binding.value !== undefined && isStringExpression(binding.value, content));

    concatenations.push(
      Object.freeze({
        target: targetText,
        form: site.form,
        lineNumber: getLineNumber(node),
        parentFunction: frame.functionName,
        isInLoop: loop !== undefined,
        loopLineNumber: loop ? getLineNumber(loop) : undefined,
        definedOutsideLoop,
        isStringValued,
      })
    );
  });

  return concatenations;
}

export function extractTryStatements(module: ParsedModule, scopes: ScopeTable): TryStatementInfo[] {
  const statements: TryStatementInfo[] = [];
  walkModule(module, scopes, ({ node, frame }) => {
    if (node.type !== "try_statement") return;
    statements.push(
      Object.freeze({
        lineNumber: getLineNumber(node),
        endLineNumber: getEndLineNumber(node),
        parentFunction: frame.functionName,
        isInLoop: frame.loopDepth > 0,
      })
    );
  });
  return statements;
}

export function extractGlobalStatements(module: ParsedModule, scopes: ScopeTable): GlobalStatementInfo[] {
  const statements: GlobalStatementInfo[] = [];
  walkModule(module, scopes, ({ node, frame }) => {
    if (node.type !== "global_statement") return;
    const names = node.namedChildren
      .filter((child) => child.type === "identifier")
      .map((child) => getNodeText(child, module.source));
    statements.push(
      Object.freeze({
        names: Object.freeze(names),
        lineNumber: getLineNumber(node),
        parentFunction: frame.functionName,
      })
    );
  });
  return statements;
}
