import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { randomUUID } from 'crypto';
import { JsonTableStore } from './json-store.js';
import { StorageError } from '../errors/index.js';

describe('JsonTableStore', () => {
  let dataDir: string;
  let store: JsonTableStore;

  beforeEach(async () => {
    dataDir = join(tmpdir(), `flatdb-store-${randomUUID()}`);
    await fs.mkdir(dataDir, { recursive: true });
    store = new JsonTableStore(dataDir);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('meta', () => {
    it('reads as empty before the first write', async () => {
      expect(await store.readMeta()).toEqual({ tables: {} });
    });

    it('writes table names sorted and schema in declaration order', async () => {
      await store.writeMeta({
        tables: {
          users: { schema: { name: 'str', age: 'int' }, last_id: 2 },
          orders: { schema: { total: 'float' }, last_id: 0 },
        },
      });

      const text = await fs.readFile(join(dataDir, 'db_meta.json'), 'utf-8');
      expect(text).toBe(
        [
          '{',
          '  "tables": {',
          '    "orders": {',
          '      "last_id": 0,',
          '      "schema": {',
          '        "total": "float"',
          '      }',
          '    },',
          '    "users": {',
          '      "last_id": 2,',
          '      "schema": {',
          '        "name": "str",',
          '        "age": "int"',
          '      }',
          '    }',
          '  }',
          '}',
          '',
        ].join('\n')
      );
      expect(await store.readMeta()).toEqual({
        tables: {
          orders: { schema: { total: 'float' }, last_id: 0 },
          users: { schema: { name: 'str', age: 'int' }, last_id: 2 },
        },
      });
    });

    it('accepts the legacy layout', async () => {
      await fs.writeFile(
        join(dataDir, 'db_meta.json'),
        JSON.stringify({ tables: { users: { name: 'str', age: 'int' } }, counters: { users: 7 } })
      );
      expect(await store.readMeta()).toEqual({
        tables: { users: { schema: { name: 'str', age: 'int' }, last_id: 7 } },
      });
    });

    it('rejects corrupt JSON and bad types', async () => {
      await fs.writeFile(join(dataDir, 'db_meta.json'), '{"tables": ');
      await expect(store.readMeta()).rejects.toThrow(StorageError);

      await fs.writeFile(join(dataDir, 'db_meta.json'), '{"tables": {"t": {"schema": {"a": "date"}}}}');
      await expect(store.readMeta()).rejects.toThrow(`unsupported type for 'a': "date"`);
    });

    it('rejects a __proto__ field or table name', async () => {
      await fs.writeFile(join(dataDir, 'db_meta.json'), '{"tables": {"t": {"schema": {"__proto__": "int"}}}}');
      await expect(store.readMeta()).rejects.toThrow('invalid field name "__proto__"');

      await fs.writeFile(join(dataDir, 'db_meta.json'), '{"tables": {"__proto__": {"schema": {"a": "int"}}}}');
      await expect(store.readMeta()).rejects.toThrow('invalid table name "__proto__"');
    });
  });

  describe('rows', () => {
    it('reads a missing table as no rows', async () => {
      expect(await store.readTable('users')).toEqual([]);
    });

    it('writes rows with sorted keys under data/', async () => {
      await store.writeTable('users', [{ name: 'Alice', id: 1, age: 30 }]);

      const text = await fs.readFile(join(dataDir, 'data', 'users.json'), 'utf-8');
      expect(text).toBe('[\n  {\n    "age": 30,\n    "id": 1,\n    "name": "Alice"\n  }\n]\n');
      expect(await store.readTable('users')).toEqual([{ age: 30, id: 1, name: 'Alice' }]);
    });

    it('rejects non-scalar values', async () => {
      await fs.mkdir(join(dataDir, 'data'));
      await fs.writeFile(join(dataDir, 'data', 'users.json'), '[{"id": 1, "tags": []}]');
      await expect(store.readTable('users')).rejects.toThrow("row 0 field 'tags' is not a scalar");
    });

    it('removes a table file and tolerates a missing one', async () => {
      await store.writeTable('users', []);
      await store.removeTable('users');
      await store.removeTable('users');
      expect(await fs.readdir(join(dataDir, 'data'))).toEqual([]);
    });
  });

  it('reports write failures as StorageError', async () => {
    const blocked = new JsonTableStore(join(dataDir, 'file-not-dir'));
    await fs.writeFile(join(dataDir, 'file-not-dir'), 'x');
    await expect(blocked.writeTable('users', [])).rejects.toThrow(StorageError);
  });
});
