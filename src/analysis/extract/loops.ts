import { ParsedModule } from "../../frontend/parser";
import { ScopeTable } from "../../frontend/scopes";
import { getEndLineNumber, getLineNumber } from "../../frontend/node-utils";
import { LoopInfo } from "../types";
import { walkModule } from "./walker";

/**
 * Every loop in visit order; a loop's position in the result is the index
 * other loops use in `parentLoop`.
 */
export function extractLoops(module: ParsedModule, scopes: ScopeTable): LoopInfo[] {
  const loops: LoopInfo[] = [];
  walkModule(module, scopes, ({ node, frame, loop }) => {
    if (!loop) return;
    loops.push(
      Object.freeze({
        type: loop.type,
        lineNumber: getLineNumber(node),
        endLineNumber: getEndLineNumber(node),
        parentFunction: frame.functionName,
        nestingLevel: frame.loopDepth,
        isInAsyncFunction: frame.isAsync,
        parentLoop: frame.loopIndex,
      })
    );
  });
  return loops;
}
