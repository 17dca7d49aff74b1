/**
 * Shell module exports
 */

export { ShellRepl, type ShellOptions } from './repl.js';
export { CommandExecutor, helpLines, type ExecutorOptions } from './executor.js';
export { parseCommand, parseAssignment, parseAssignments } from './command-parser.js';
export { generatePrompt, generatePlainPrompt, supportsColor } from './prompt.js';
export { loadHistory, saveHistory, addToHistory } from './history.js';
export { createCompleter, getCompletions, type DynamicDataProvider } from './completer.js';
export type { ShellCommand, ShellCommandName, ExecutionResult } from './types.js';
export { DATA_COMMANDS, SHELL_BUILTINS, getAllCommands } from './types.js';
