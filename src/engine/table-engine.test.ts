import { describe, it, expect, beforeEach } from 'vitest';
import { TableEngine } from './table-engine.js';
import { SelectCache } from './select-cache.js';
import { createConfirmer } from './confirm.js';
import { MemoryTableStore } from '../storage/memory-store.js';
import {
  OperationCancelledError,
  SchemaError,
  TableExistsError,
  TableNotFoundError,
  TypeMismatchError,
  ValidationError,
  WhereError,
} from '../errors/index.js';

describe('TableEngine', () => {
  let store: MemoryTableStore;
  let engine: TableEngine;

  beforeEach(async () => {
    store = new MemoryTableStore();
    engine = new TableEngine({ store });
    await engine.createTable('users', [
      ['name', 'str'],
      ['age', 'int'],
      ['is_active', 'bool'],
    ]);
  });

  it('runs the users scenario end to end', async () => {
    await engine.insert('users', { name: '"Alice"', age: '30', is_active: 'true' });
    await engine.insert('users', { name: '"Bob"', age: '25', is_active: 'true' });

    const result = await engine.select('users', 'age>=30 and is_active=true');

    expect(result.rows).toEqual([{ id: 1, name: 'Alice', age: 30, is_active: true }]);
  });

  describe('createTable', () => {
    it('records an empty table', async () => {
      expect(await engine.describeTable('users')).toEqual({
        table: 'users',
        schema: { name: 'str', age: 'int', is_active: 'bool' },
        lastId: 0,
        rowCount: 0,
      });
    });

    it('rejects duplicates, bad names and bad columns', async () => {
      await expect(engine.createTable('users', [['x', 'int']])).rejects.toThrow(TableExistsError);
      await expect(engine.createTable('bad-name', [['x', 'int']])).rejects.toThrow(ValidationError);
      await expect(engine.createTable('t', [['id', 'int']])).rejects.toThrow(SchemaError);
      await expect(engine.createTable('t', [['__proto__', 'int']])).rejects.toThrow(SchemaError);
      await expect(engine.createTable('__proto__', [['x', 'int']])).rejects.toThrow(ValidationError);
      await expect(engine.createTable('t', [])).rejects.toThrow(SchemaError);
    });
  });

  describe('insert', () => {
    it('assigns increasing ids that are never reused', async () => {
      const first = await engine.insert('users', { name: 'a', age: '1', is_active: 'no' });
      const second = await engine.insert('users', { name: 'b', age: '2', is_active: 'no' });
      await engine.delete('users', 'id=2');
      const third = await engine.insert('users', { name: 'c', age: '3', is_active: 'no' });

      expect([first.id, second.id, third.id]).toEqual([1, 2, 3]);
      expect((await engine.describeTable('users')).lastId).toBe(3);
    });

    it('leaves the counter alone when validation fails', async () => {
      await expect(engine.insert('users', { name: 'a', age: 'old', is_active: 'no' })).rejects.toThrow(
        TypeMismatchError
      );
      await expect(engine.insert('users', { name: 'a', age: '1' })).rejects.toThrow('Missing fields: is_active');
      await expect(engine.insert('users', { id: '9', name: 'a', age: '1', is_active: 'y' })).rejects.toThrow(
        ValidationError
      );

      const row = await engine.insert('users', { name: 'a', age: '1', is_active: 'y' });
      expect(row.id).toBe(1);
    });

    it('fails on a missing table', async () => {
      await expect(engine.insert('ghosts', { a: '1' })).rejects.toThrow(new TableNotFoundError('ghosts'));
    });
  });

  describe('select', () => {
    beforeEach(async () => {
      await engine.insert('users', { name: 'Ann', age: '30', is_active: 'true' });
      await engine.insert('users', { name: 'Bob', age: 'null', is_active: 'false' });
      await engine.insert('users', { name: 'Cid', age: '17', is_active: 'true' });
    });

    it('returns every row without a where-clause', async () => {
      const { rows } = await engine.select('users');
      expect(rows.map((r) => r.name)).toEqual(['Ann', 'Bob', 'Cid']);
    });

    it('never orders null values', async () => {
      const below = await engine.select('users', 'age<100');
      const above = await engine.select('users', 'age>=0');
      expect(below.rows.map((r) => r.id)).toEqual([1, 3]);
      expect(above.rows.map((r) => r.id)).toEqual([1, 3]);
      expect((await engine.select('users', 'age=null')).rows.map((r) => r.id)).toEqual([2]);
    });

    it('requires every strict condition', async () => {
      const { rows } = await engine.select('users', 'is_active=true and age<18');
      expect(rows.map((r) => r.id)).toEqual([3]);
    });

    it('rejects unknown fields in strict where-clauses', async () => {
      await expect(engine.select('users', 'salary>1')).rejects.toThrow("Unknown field in where: 'salary'");
    });
  });

  describe('select cache', () => {
    beforeEach(async () => {
      await engine.insert('users', { name: 'Ann', age: '30', is_active: 'true' });
    });

    it('serves repeated selects from cache', async () => {
      expect((await engine.select('users', 'age>1')).fromCache).toBe(false);
      expect((await engine.select('users', 'age > 1')).fromCache).toBe(true);
    });

    it('returns copies that callers cannot corrupt', async () => {
      const first = await engine.select('users');
      first.rows[0].name = 'changed';
      const second = await engine.select('users');
      expect(second.fromCache).toBe(true);
      expect(second.rows[0].name).toBe('Ann');
    });

    it('never serves rows older than the last write', async () => {
      await engine.select('users');
      await engine.insert('users', { name: 'Bob', age: '5', is_active: 'false' });
      const afterInsert = await engine.select('users');
      expect(afterInsert.fromCache).toBe(false);
      expect(afterInsert.rows).toHaveLength(2);

      await engine.update('users', { age: '31' }, 'name="Ann"');
      const afterUpdate = await engine.select('users', 'name="Ann"');
      expect(afterUpdate.rows[0].age).toBe(31);

      await engine.delete('users', 'name="Bob"');
      expect((await engine.select('users')).rows).toHaveLength(1);
    });

    it('can be disabled', async () => {
      const uncached = new TableEngine({ store, cache: new SelectCache(false) });
      await uncached.select('users');
      expect((await uncached.select('users')).fromCache).toBe(false);
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await engine.insert('users', { name: 'Ann', age: '30', is_active: 'true' });
      await engine.insert('users', { name: 'Bob', age: '20', is_active: 'true' });
    });

    it('changes matching rows and reports the count', async () => {
      expect(await engine.update('users', { is_active: 'no' }, 'age>25')).toBe(1);
      const { rows } = await engine.select('users');
      expect(rows.map((r) => r.is_active)).toEqual([false, true]);
    });

    it('does not write when nothing matches', async () => {
      const before = store.writes;
      expect(await engine.update('users', { age: '1' }, 'name="Zed"')).toBe(0);
      expect(store.writes).toBe(before);
    });

    it('refuses to change id', async () => {
      await expect(engine.update('users', { id: '5' }, 'age>1')).rejects.toThrow("Field 'id' cannot be changed");
    });
  });

  describe('expression grammar', () => {
    it('evaluates or and parentheses', async () => {
      const expr = new TableEngine({ store, grammar: 'expression' });
      await expr.insert('users', { name: 'Ann', age: '30', is_active: 'false' });
      await expr.insert('users', { name: 'Bob', age: '15', is_active: 'true' });
      await expr.insert('users', { name: 'Cid', age: '15', is_active: 'false' });

      const { rows } = await expr.select('users', '(age >= 18 or is_active = true) and name != "Zed"');
      expect(rows.map((r) => r.name)).toEqual(['Ann', 'Bob']);
      await expect(expr.select('users', 'len(name) > 2')).rejects.toThrow(WhereError);
    });
  });

  describe('bulk writes', () => {
    beforeEach(async () => {
      await engine.insert('users', { name: 'Ann', age: '30', is_active: 'true' });
    });

    it('refuses unconditional deletes under require-flag', async () => {
      const strict = new TableEngine({ store, confirmer: createConfirmer({ policy: 'require-flag' }) });
      await expect(strict.delete('users')).rejects.toThrow(OperationCancelledError);
      expect(await strict.delete('users', undefined, { assumeYes: true })).toBe(1);
    });

    it('asks under prompt and stops when declined', async () => {
      const questions: string[] = [];
      const prompting = new TableEngine({
        store,
        confirmer: createConfirmer({
          policy: 'prompt',
          ask: async (q) => {
            questions.push(q);
            return 'n';
          },
        }),
      });

      await expect(prompting.update('users', { age: '1' })).rejects.toThrow(new OperationCancelledError());
      expect(questions).toEqual(["Update all rows in 'users'? [y/N] "]);
      expect((await prompting.select('users')).rows[0].age).toBe(30);
    });

    it('does not ask when a where-clause is given', async () => {
      const strict = new TableEngine({ store, confirmer: createConfirmer({ policy: 'require-flag' }) });
      expect(await strict.delete('users', 'age=30')).toBe(1);
    });
  });

  describe('dropTable', () => {
    it('removes the table and allows recreating it', async () => {
      await engine.insert('users', { name: 'Ann', age: '30', is_active: 'true' });
      await engine.dropTable('users');

      expect(await engine.listTables()).toEqual([]);
      await expect(engine.select('users')).rejects.toThrow(TableNotFoundError);

      await engine.createTable('users', [['name', 'str']]);
      expect((await engine.select('users')).rows).toEqual([]);
    });

    it('fails on a missing table', async () => {
      await expect(engine.dropTable('ghosts')).rejects.toThrow("Table not found: 'ghosts'");
    });
  });

  it('lists tables sorted by name', async () => {
    await engine.createTable('accounts', [['owner', 'str']]);
    expect(await engine.listTables()).toEqual([
      { table: 'accounts', schema: { owner: 'str' }, rowsFile: 'memory:accounts' },
      { table: 'users', schema: { name: 'str', age: 'int', is_active: 'bool' }, rowsFile: 'memory:users' },
    ]);
  });
});
