import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  formatCell,
  formatTable,
  orderColumns,
  outputError,
  outputSuccess,
  outputTable,
  renderRows,
  renderTableList,
  renderDescription,
  formatCount,
  formatSchema,
  setOutputOptions,
} from './output.js';
import { TableNotFoundError } from '../errors/index.js';

describe('output', () => {
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((msg: unknown) => {
      logs.push(String(msg));
    });
    vi.spyOn(console, 'error').mockImplementation((msg: unknown) => {
      errors.push(String(msg));
    });
  });

  afterEach(() => {
    setOutputOptions({ json: false, verbose: false });
    vi.restoreAllMocks();
  });

  describe('formatTable', () => {
    it('pads columns to the widest cell', () => {
      expect(
        formatTable(
          ['id', 'name'],
          [
            ['1', 'Alice'],
            ['10', 'Bo'],
          ]
        )
      ).toEqual(['id  name', '--------', '1   Alice', '10  Bo']);
    });
  });

  describe('renderRows', () => {
    it('puts id first and sorts the other columns', () => {
      expect(renderRows([{ name: 'Alice', age: 30, id: 1, is_active: true }])).toEqual([
        'id  age  is_active  name',
        '------------------------',
        '1   30   true       Alice',
      ]);
    });

    it('renders null and marks cached results', () => {
      expect(renderRows([{ id: 2, age: null }], true)).toEqual(['id  age', '-------', '2   null', '[cache]']);
    });

    it('reports an empty result', () => {
      expect(renderRows([], true)).toEqual(['Empty result.']);
    });
  });

  describe('orderColumns', () => {
    it('collects fields across rows', () => {
      expect(orderColumns([{ b: 1 }, { id: 1, a: 2 }])).toEqual(['id', 'a', 'b']);
    });
  });

  it('formats cells', () => {
    expect([formatCell(null), formatCell(false), formatCell(1.5), formatCell(undefined)]).toEqual([
      'null',
      'false',
      '1.5',
      '',
    ]);
  });

  describe('outputError', () => {
    it('prints one line for domain errors', () => {
      setOutputOptions({ verbose: true });
      outputError("Table not found: 'x'", new TableNotFoundError('x'));
      expect(errors).toEqual(["Error: Table not found: 'x'"]);
    });

    it('adds the stack of unexpected errors under --verbose', () => {
      setOutputOptions({ verbose: true });
      const error = new Error('boom');
      outputError('boom', error);
      expect(errors).toEqual(['Error: boom', String(error.stack)]);
    });

    it('renders JSON with the error code', () => {
      setOutputOptions({ json: true });
      outputError("Table not found: 'x'", new TableNotFoundError('x'));
      expect(JSON.parse(errors[0])).toEqual({ error: "Table not found: 'x'", code: 'TABLE_NOT_FOUND' });
    });
  });

  it('prints success messages and JSON tables', () => {
    outputSuccess('Created');
    setOutputOptions({ json: true });
    outputTable(['table'], [['users']]);
    expect(logs[0]).toBe('✓ Created');
    expect(JSON.parse(logs[1])).toEqual([{ table: 'users' }]);
  });
});

describe('result rendering', () => {
  it('formats schemas in declaration order', () => {
    expect(formatSchema({ name: 'str', age: 'int' })).toBe('name:str age:int');
  });

  it('pluralizes row counts', () => {
    expect(formatCount('Updated', 1)).toBe('Updated 1 row');
    expect(formatCount('Deleted', 0)).toBe('Deleted 0 rows');
  });

  it('lists tables', () => {
    expect(renderTableList([])).toEqual(['No tables.']);
    expect(renderTableList([{ table: 't', schema: { a: 'bool' } }])).toEqual(['table  columns', '--------------', 't      a:bool']);
  });

  it('describes a table', () => {
    expect(renderDescription({ table: 't', schema: { a: 'bool' }, lastId: 4, rowCount: 2 })).toEqual([
      'table:   t',
      'columns: id:int a:bool',
      'last id: 4',
      'rows:    2',
    ]);
  });
});
