import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CommandExecutor, helpLines } from './executor.js';
import { TableEngine, createConfirmer, type TableOperations } from '../engine/index.js';
import { MemoryTableStore } from '../storage/index.js';

describe('CommandExecutor', () => {
  let executor: CommandExecutor;

  beforeEach(() => {
    executor = new CommandExecutor(new TableEngine({ store: new MemoryTableStore() }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function lines(line: string): Promise<string[]> {
    return (await executor.run(line)).lines;
  }

  it('runs the users scenario end to end', async () => {
    expect(await lines('create_table users name:str age:int')).toEqual(["Created table 'users' (name:str age:int)"]);
    expect(await lines('insert users name="Alice" age=30')).toEqual(['Inserted row with id 1']);
    expect(await lines('insert users name=Bob age=25')).toEqual(['Inserted row with id 2']);

    expect(await lines('select users where age >= 30')).toEqual(['id  age  name', '-------------', '1   30   Alice']);
    expect(await lines('select users where age >= 30')).toEqual([
      'id  age  name',
      '-------------',
      '1   30   Alice',
      '[cache]',
    ]);

    expect(await lines('update users set age=31 where name = "Alice"')).toEqual(['Updated 1 row']);
    expect(await lines('delete users where id = 2')).toEqual(['Deleted 1 row']);
    expect(await lines('select users where age >= 30')).toEqual(['id  age  name', '-------------', '1   31   Alice']);

    expect(await lines('describe users')).toEqual([
      'table:   users',
      'columns: id:int name:str age:int',
      'last id: 2',
      'rows:    1',
    ]);
  });

  it('lists tables', async () => {
    expect(await lines('list_tables')).toEqual(['No tables.']);

    await executor.run('create_table users name:str age:int');
    expect(await lines('list_tables')).toEqual(['table  columns', '--------------', 'users  name:str age:int']);
  });

  it('reports empty results', async () => {
    await executor.run('create_table users name:str');
    expect(await lines('select users')).toEqual(['Empty result.']);
  });

  it('renders domain errors as one line', async () => {
    const result = await executor.run('select ghosts');
    expect(result).toEqual({ ok: false, lines: ["Error: Table not found: 'ghosts'"] });
  });

  it('renders parse errors', async () => {
    expect(await executor.run('insert users')).toEqual({
      ok: false,
      lines: ['Error: Usage: insert <table> <field=value> ...'],
    });
  });

  it('refuses bulk deletes without --yes under require-flag', async () => {
    executor = new CommandExecutor(
      new TableEngine({ store: new MemoryTableStore(), confirmer: createConfirmer({ policy: 'require-flag' }) })
    );
    await executor.run('create_table users name:str');
    await executor.run('insert users name=Ann');
    await executor.run('insert users name=Bo');

    expect(await lines('delete users')).toEqual([
      "Error: Delete all rows from 'users'? Refused without confirmation (pass --yes)",
    ]);
    expect(await lines('delete users --yes')).toEqual(['Deleted 2 rows']);
  });

  it('reports unexpected failures and keeps going', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const engine = new TableEngine({ store: new MemoryTableStore() });
    vi.spyOn(engine, 'listTables').mockRejectedValue(new Error('boom'));
    executor = new CommandExecutor(engine);

    expect(await executor.run('list_tables')).toEqual({ ok: false, lines: ['Error: Unexpected error: boom'] });
    expect(String(stderr.mock.calls[0][0])).toContain('[ERROR] [shell] Unexpected failure: boom');
  });

  it('adds the stack in verbose mode', async () => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const failing: TableOperations = new TableEngine({ store: new MemoryTableStore() });
    vi.spyOn(failing, 'listTables').mockRejectedValue(new Error('boom'));
    executor = new CommandExecutor(failing, { verbose: true });

    const result = await executor.run('list_tables');
    expect(result.lines).toHaveLength(2);
    expect(result.lines[1]).toContain('Error: boom');
  });

  it('handles shell builtins', async () => {
    expect(await executor.run('')).toEqual({ ok: true, lines: [] });
    expect(await executor.run('exit')).toEqual({ ok: true, lines: [], exit: true });
    expect(await executor.run('clear')).toEqual({ ok: true, lines: [], clear: true });
    expect(await lines('help select')).toEqual(['Usage: select <table> [where <condition>]']);
  });
});

describe('helpLines', () => {
  it('lists every command once', () => {
    const help = helpLines();
    expect(help[0]).toBe('Commands:');
    expect(help).toContain('  exit | quit');
    expect(help.filter((line) => line.startsWith('  select'))).toEqual(['  select <table> [where <condition>]']);
  });

  it('maps quit to exit and reports unknown topics', () => {
    expect(helpLines('quit')).toEqual(['Usage: exit | quit']);
    expect(helpLines('nope')).toEqual(["No help for 'nope'"]);
  });
});
