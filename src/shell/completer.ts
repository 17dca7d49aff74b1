/**
 * Shell TAB completion
 */

import { COMMAND_KEYWORDS, TABLE_COMMANDS, getAllCommands } from './types.js';

/**
 * Completion data. Called synchronously from readline, so implementations
 * answer from a snapshot rather than reading the store.
 */
export type DynamicDataProvider = {
  getTableNames: () => string[];
  getFieldNames: (table: string) => string[];
};

function tokenize(line: string): string[] {
  return line
    .trim()
    .split(/\s+/)
    .filter((t) => t !== '');
}

/**
 * Get completions for the current input
 */
export function getCompletions(line: string, dataProvider: DynamicDataProvider): [string[], string] {
  const tokens = tokenize(line);
  const isNewToken = line.endsWith(' ') || tokens.length === 0;

  const tokenToComplete = isNewToken ? '' : tokens[tokens.length - 1];
  const completedTokens = isNewToken ? tokens : tokens.slice(0, -1);

  const candidates = getCandidates(completedTokens, dataProvider);
  const matches = candidates.filter((c) => c.startsWith(tokenToComplete));

  return [matches, tokenToComplete];
}

function getCandidates(tokens: string[], dataProvider: DynamicDataProvider): string[] {
  if (tokens.length === 0) {
    return getAllCommands();
  }

  const command = tokens[0].toLowerCase();

  if (command === 'help') {
    return tokens.length === 1 ? getAllCommands() : [];
  }

  if (!TABLE_COMMANDS.includes(command)) {
    return [];
  }

  if (tokens.length === 1) {
    return dataProvider.getTableNames();
  }

  const fields = dataProvider.getFieldNames(tokens[1]);
  const candidates: string[] = [];

  switch (command) {
    case 'insert':
      candidates.push(...fields.map((f) => `${f}=`));
      break;
    case 'select':
    case 'update':
    case 'delete':
      candidates.push(...(COMMAND_KEYWORDS[command] ?? []), ...fields);
      break;
  }

  if (command === 'update' || command === 'delete' || command === 'drop_table') {
    candidates.push('--yes');
  }

  return [...new Set(candidates)];
}

/**
 * Create a readline completer function
 */
export function createCompleter(dataProvider: DynamicDataProvider): (line: string) => [string[], string] {
  return (line: string) => getCompletions(line, dataProvider);
}
