import { ParsedModule } from "../../frontend/parser";
import { ScopeTable } from "../../frontend/scopes";
import { NameResolver, getCallName } from "../../frontend/resolver";
import { getField, getLineNumber } from "../../frontend/node-utils";
import { CallInfo } from "../types";
import { walkModule } from "./walker";

/**
 * Every call whose callee is a name or an attribute chain, outermost call
 * of a chain first.
 */
export function extractCalls(module: ParsedModule, scopes: ScopeTable): CallInfo[] {
  const resolver = new NameResolver(scopes, module.source);
  const calls: CallInfo[] = [];

  walkModule(module, scopes, ({ node, frame }) => {
    if (node.type !== "call") return;

    const callee = getField(node, "function");
    if (!callee) return;
    const functionName = getCallName(callee, module.source);
    if (!functionName) return;

    calls.push(
      Object.freeze({
        functionName,
        lineNumber: getLineNumber(node),
        parentFunction: frame.functionName,
        isInLoop: frame.loopDepth > 0,
        isInAsyncFunction: frame.isAsync,
        inferredCallable: resolver.resolveCallee(callee, frame.scope),
      })
    );
  });

  return calls;
}
