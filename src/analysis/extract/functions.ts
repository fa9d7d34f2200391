import { ParsedModule } from "../../frontend/parser";
import { ScopeTable, listParameters } from "../../frontend/scopes";
import {
  SyntaxNode,
  getDefinitionName,
  getEndLineNumber,
  getField,
  getLineNumber,
  getNodeText,
  isAsyncFunction,
} from "../../frontend/node-utils";
import { FunctionInfo } from "../types";
import { walkModule } from "./walker";

/** Builtin type of a literal default value. */
const LITERAL_TYPES: Record<string, string> = {
  integer: "int",
  float: "float",
  string: "str",
  concatenated_string: "str",
  true: "bool",
  false: "bool",
  none: "None",
  list: "list",
  list_comprehension: "list",
  dictionary: "dict",
  dictionary_comprehension: "dict",
  set: "set",
  set_comprehension: "set",
  tuple: "tuple",
};

function literalType(node: SyntaxNode): string | undefined {
  if (node.type === "unary_operator") {
    const argument = getField(node, "argument");
    return argument ? literalType(argument) : undefined;
  }
  return LITERAL_TYPES[node.type];
}

function compact(text: string): string {
  return text.replace(/\s+/g, "");
}

function getDecoratorName(decorator: SyntaxNode, content: string): string {
  const expression = decorator.namedChildren.find((child) => child.type !== "comment");
  if (!expression) return compact(getNodeText(decorator, content)).replace(/^@/, "");

  if (expression.type === "call") {
    const callee = getField(expression, "function");
    if (callee && (callee.type === "identifier" || callee.type === "attribute")) {
      return compact(getNodeText(callee, content));
    }
  }
  return compact(getNodeText(expression, content));
}

function getDecorators(node: SyntaxNode, content: string): string[] {
  const parent = node.parent;
  if (!parent || parent.type !== "decorated_definition") return [];
  return parent.namedChildren
    .filter((child) => child.type === "decorator")
    .map((child) => getDecoratorName(child, content));
}

/** Inner text of a string literal, without prefix and quotes. */
export function stringLiteralValue(text: string): string {
  const match = /^[A-Za-z]*("""|'''|"|')([\s\S]*)\1$/.exec(text);
  return match ? match[2] : text;
}

function getDocstring(node: SyntaxNode, content: string): string | undefined {
  const body = getField(node, "body");
  if (!body) return undefined;

  const first = body.namedChildren.find((child) => child.type !== "comment");
  if (!first || first.type !== "expression_statement") return undefined;

  const expressions = first.namedChildren;
  if (expressions.length !== 1 || expressions[0].type !== "string") return undefined;
  return stringLiteralValue(getNodeText(expressions[0], content));
}

function buildFunctionInfo(node: SyntaxNode, content: string): FunctionInfo {
  const parameters: string[] = [];
  const inferredTypes: Record<string, string> = {};

  for (const param of listParameters(getField(node, "parameters"))) {
    const name = getNodeText(param.nameNode, content);
    parameters.push(name);

    if (param.annotation) {
      inferredTypes[name] = getNodeText(param.annotation, content);
    } else if (param.defaultValue) {
      const type = literalType(param.defaultValue);
      if (type) inferredTypes[name] = type;
    }
  }

  const returnType = getField(node, "return_type");

  return Object.freeze({
    name: getDefinitionName(node, content) ?? "<function>",
    lineNumber: getLineNumber(node),
    endLineNumber: getEndLineNumber(node),
    isAsync: isAsyncFunction(node),
    parameters: Object.freeze(parameters),
    decorators: Object.freeze(getDecorators(node, content)),
    returnAnnotation: returnType ? getNodeText(returnType, content) : undefined,
    docstring: getDocstring(node, content),
    inferredTypes: Object.freeze(inferredTypes),
  });
}

/**
 * Every `def` and `async def` in the module, nested ones included.
 */
export function extractFunctions(module: ParsedModule, scopes: ScopeTable): FunctionInfo[] {
  const functions: FunctionInfo[] = [];
  walkModule(module, scopes, ({ node }) => {
    if (node.type === "function_definition") {
      functions.push(buildFunctionInfo(node, module.source));
    }
  });
  return functions;
}
