import { tokenize } from "../lexer/lexer.js";
import { parse } from "../parser/parser.js";
import type { Command } from "../types/command.js";
import type { Executor } from "./executor.js";

export interface CommandResult {
  /** 1-based position in the program. */
  index: number;
  command: Command;
  message: string;
  ok: boolean;
}

export interface RunReport {
  commands: Command[];
  results: CommandResult[];
}

const EXECUTION_ERROR_PREFIX = "Error executing command:";

/**
 * Tokenize, parse and execute a whole program.
 *
 * Lexical and syntax errors propagate before anything is drawn. Execution
 * errors are recorded per command and do not stop the commands after them.
 */
export function runProgram(source: string, executor: Executor): RunReport {
  const tokens = tokenize(source).filter((t) => t.kind !== "EndOfInput");
  const commands = parse(tokens);

  const results = commands.map((command, i): CommandResult => {
    const message = executor.execute(command);
    return {
      index: i + 1,
      command,
      message,
      ok: !message.startsWith(EXECUTION_ERROR_PREFIX),
    };
  });

  return { commands, results };
}
