/**
 * Shell REPL implementation
 */

import * as readline from 'readline';
import type { TableOperations } from '../engine/index.js';
import type { SchemaFields } from '../types/index.js';
import { CommandExecutor } from './executor.js';
import { generatePlainPrompt, generatePrompt, printError, printInfo } from './prompt.js';
import { loadHistory, saveHistory, addToHistory, MAX_HISTORY_SIZE } from './history.js';
import { createCompleter, type DynamicDataProvider } from './completer.js';
import { getHistoryPath } from '../utils/config-path.js';
import { logger } from '../utils/logger.js';

export interface ShellOptions {
  dataDir: string;
  historyPath?: string;
  verbose?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Shell REPL class
 */
export class ShellRepl {
  private readonly executor: CommandExecutor;
  private readonly historyPath: string;
  private rl: readline.Interface | null = null;
  private history: string[] = [];
  private running = false;
  private exited = false;
  private pending: Promise<void> = Promise.resolve();

  // Completion snapshot, refreshed after every command
  private tables: Record<string, SchemaFields> = {};

  constructor(
    private readonly engine: TableOperations,
    private readonly options: ShellOptions
  ) {
    this.executor = new CommandExecutor(engine, { verbose: options.verbose });
    this.historyPath = options.historyPath ?? getHistoryPath();
  }

  /**
   * Yes/no question on the shell's own readline; used for bulk-write confirmation
   */
  ask(question: string): Promise<string> {
    const rl = this.rl;
    if (!rl || !this.running) {
      return Promise.resolve('');
    }
    return new Promise((resolve) => rl.question(question, resolve));
  }

  private getDataProvider(): DynamicDataProvider {
    return {
      getTableNames: () => Object.keys(this.tables).sort(),
      getFieldNames: (table) => ['id', ...Object.keys(this.tables[table] ?? {})],
    };
  }

  private async refreshCompletions(): Promise<void> {
    try {
      const tables = await this.engine.listTables();
      this.tables = Object.fromEntries(tables.map((t) => [t.table, t.schema]));
    } catch (error) {
      logger.warn(`Cannot load table names: ${error instanceof Error ? error.message : String(error)}`, 'shell');
    }
  }

  private prompt(): string {
    return this.rl?.terminal ? generatePrompt(this.options.dataDir) : generatePlainPrompt(this.options.dataDir);
  }

  /**
   * Start the REPL; resolves once the shell has closed
   */
  async start(): Promise<void> {
    this.history = loadHistory(this.historyPath);
    await this.refreshCompletions();

    const completer = createCompleter(this.getDataProvider());
    const input = this.options.input ?? process.stdin;
    const output = this.options.output ?? process.stdout;

    const rl = readline.createInterface({
      input,
      output,
      completer,
      // readline wants newest first
      history: [...this.history].reverse(),
      historySize: MAX_HISTORY_SIZE,
      terminal: 'isTTY' in output && output.isTTY === true,
    });
    this.rl = rl;
    rl.setPrompt(this.prompt());

    this.running = true;

    if (rl.terminal) {
      console.log();
      printInfo('flatdb shell - Type "help" for available commands, "exit" to quit');
      console.log();
      rl.prompt();
    }

    const closed = new Promise<void>((resolve) => {
      rl.on('close', () => {
        this.running = false;
        // Piped input may close before queued lines have run
        this.pending = this.pending.then(() => {
          saveHistory(this.history, this.historyPath);
          if (rl.terminal) {
            console.log();
            printInfo('Goodbye!');
          }
          resolve();
        });
      });
    });

    rl.on('line', (line) => {
      this.pending = this.pending
        .then(() => this.processLine(line))
        .catch((error: unknown) => {
          logger.error(`Shell failure: ${error instanceof Error ? error.message : String(error)}`, 'shell');
        });
    });

    // Handle SIGINT (Ctrl+C)
    rl.on('SIGINT', () => {
      console.log();
      rl.prompt();
    });

    return closed;
  }

  /**
   * Process a line of input
   */
  private async processLine(line: string): Promise<void> {
    const trimmed = line.trim();
    if (this.exited) {
      return;
    }

    if (trimmed) {
      this.history = addToHistory(this.history, trimmed);
      const result = await this.executor.run(trimmed);

      if (result.clear) {
        console.clear();
      }
      for (const text of result.lines) {
        if (result.ok) {
          console.log(text);
        } else {
          printError(text);
        }
      }
      if (result.exit) {
        this.exited = true;
        if (this.running) {
          this.rl?.close();
        }
        return;
      }
      await this.refreshCompletions();
    }

    if (this.running && this.rl?.terminal) {
      this.rl.prompt();
    }
  }
}
