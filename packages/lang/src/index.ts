export * from "./ast.js";
export * from "./errors.js";
export * from "./parser/types.js";
export { Tokenizer } from "./parser/tokenizer.js";
export { Parser, parseProgram, parseQuery, parseTerm } from "./parser/parser.js";
export * from "./compiler/index.js";
export { formatSolution, unparse } from "./printer.js";
export { Query } from "./query.js";
export type { QueryHost, Solution } from "./query.js";
export { Program } from "./program.js";
export type { ProgramOptions } from "./program.js";
export { ConfigurationManager } from "./shared/config.js";
export { Logger, getDefaultLogger } from "./shared/logger.js";
export type { LogData } from "./shared/logger.js";
export type {
  ClausalConfig,
  ConfigOverrides,
  LogConfig,
  QueryConfig,
} from "./shared/types.js";
