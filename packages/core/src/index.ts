export * from "./types/token.js";
export * from "./types/command.js";
export * from "./types/surface.js";
export * from "./types/session.js";
export { LexError, ParseError, errorMessage } from "./errors.js";
export { tokenize } from "./lexer/lexer.js";
export { parse } from "./parser/parser.js";
export { parseSessionConfig } from "./parser/config-parser.js";
export {
  COLOR_TABLE,
  DEFAULT_COLOR,
  isColorName,
  resolveColor,
} from "./executor/colors.js";
export { Executor } from "./executor/executor.js";
export type { ExecutorOptions, InterpreterState } from "./executor/executor.js";
export { runProgram } from "./executor/run-program.js";
export type { CommandResult, RunReport } from "./executor/run-program.js";
export { checkProgram, checkSource } from "./analysis/check-program.js";
export type { CheckIssue, CheckResult } from "./analysis/check-program.js";
