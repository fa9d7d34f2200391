import { ParsedModule } from "../../frontend/parser";
import { ScopeTable, dottedText, resolveRelativeModule } from "../../frontend/scopes";
import { SyntaxNode, getField, getLineNumber, nodeKey } from "../../frontend/node-utils";
import { ImportInfo } from "../types";
import { walkModule } from "./walker";

interface ImportedName {
  name: string;
  alias?: string;
}

function readImportedName(item: SyntaxNode, content: string): ImportedName | undefined {
  if (item.type === "dotted_name") {
    return { name: dottedText(item, content) };
  }
  if (item.type === "aliased_import") {
    const name = getField(item, "name");
    const alias = getField(item, "alias");
    if (!name) return undefined;
    return {
      name: dottedText(name, content),
      alias: alias ? dottedText(alias, content) : undefined,
    };
  }
  return undefined;
}

/** `import a, b as c` -> one record per imported module. */
function plainImports(node: SyntaxNode, content: string): ImportInfo[] {
  const records: ImportInfo[] = [];
  for (const item of node.namedChildren) {
    const imported = readImportedName(item, content);
    if (!imported) continue;
    records.push(
      Object.freeze({
        module: imported.name,
        names: Object.freeze([imported.name]),
        lineNumber: getLineNumber(node),
        isFromImport: false,
        aliases: Object.freeze(imported.alias ? { [imported.name]: imported.alias } : {}),
        resolvedModule: imported.name,
      })
    );
  }
  return records;
}

function fromImport(node: SyntaxNode, content: string, moduleName: string): ImportInfo | undefined {
  const moduleNode = getField(node, "module_name");
  const moduleText = node.type === "future_import_statement"
    ? "__future__"
    : moduleNode
      ? dottedText(moduleNode, content)
      : undefined;
  if (!moduleText) return undefined;

  const moduleKey = moduleNode ? nodeKey(moduleNode) : undefined;
  const names: string[] = [];
  const aliases: Record<string, string> = {};

  for (const item of node.namedChildren) {
    if (nodeKey(item) === moduleKey) continue;
    if (item.type === "wildcard_import") {
      names.push("*");
      continue;
    }
    const imported = readImportedName(item, content);
    if (!imported) continue;
    names.push(imported.name);
    if (imported.alias) aliases[imported.name] = imported.alias;
  }

  return Object.freeze({
    module: moduleText,
    names: Object.freeze(names),
    lineNumber: getLineNumber(node),
    isFromImport: true,
    aliases: Object.freeze(aliases),
    resolvedModule: resolveRelativeModule(moduleText, moduleName),
  });
}

/**
 * Import statements in source order, including imports nested in functions.
 */
export function extractImports(module: ParsedModule, scopes: ScopeTable): ImportInfo[] {
  const imports: ImportInfo[] = [];
  walkModule(module, scopes, ({ node }) => {
    switch (node.type) {
      case "import_statement":
        imports.push(...plainImports(node, module.source));
        break;
      case "import_from_statement":
      case "future_import_statement": {
        const record = fromImport(node, module.source, module.moduleName);
        if (record) imports.push(record);
        break;
      }
      default:
        break;
    }
  });
  return imports;
}
