export * from "./types";
export { matchesName, classify } from "./matching";
export { readCatalogTables } from "./entries";
export {
  DEFAULT_CATALOG,
  extendCatalog,
  classifyOrmQuery,
  isOrmQuery,
  getOrmSuggestion,
  classifyBlockingIo,
  isBlockingIo,
  getAsyncAlternative,
  classifyMemoryLoad,
  isMemoryIntensive,
  getMemoryOptimizationSuggestion,
  describeMemoryLoad,
  isTypeConversion,
} from "./catalog";
