/**
 * Tests for shell TAB completion
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getCompletions, type DynamicDataProvider } from './completer.js';

function createMockDataProvider(): DynamicDataProvider {
  return {
    getTableNames: vi.fn(() => ['orders', 'users']),
    getFieldNames: vi.fn((table: string) => (table === 'users' ? ['id', 'name', 'age'] : [])),
  };
}

describe('getCompletions', () => {
  let dataProvider: DynamicDataProvider;

  beforeEach(() => {
    dataProvider = createMockDataProvider();
  });

  describe('command completion', () => {
    it('should offer every command on an empty line', () => {
      const [completions, token] = getCompletions('', dataProvider);

      expect(token).toBe('');
      expect(completions).toContain('create_table');
      expect(completions).toContain('select');
      expect(completions).toContain('help');
      expect(completions).toContain('quit');
    });

    it('should filter by prefix', () => {
      expect(getCompletions('de', dataProvider)).toEqual([['describe', 'delete'], 'de']);
    });

    it('should complete help topics', () => {
      const [completions] = getCompletions('help sel', dataProvider);
      expect(completions).toEqual(['select']);
    });
  });

  describe('table names', () => {
    it('should complete table names after a table command', () => {
      expect(getCompletions('select ', dataProvider)).toEqual([['orders', 'users'], '']);
      expect(getCompletions('insert u', dataProvider)).toEqual([['users'], 'u']);
    });

    it('should not offer tables for create_table or list_tables', () => {
      expect(getCompletions('create_table ', dataProvider)[0]).toEqual([]);
      expect(getCompletions('list_tables ', dataProvider)[0]).toEqual([]);
    });
  });

  describe('after the table name', () => {
    it('should offer field assignments for insert', () => {
      const [completions] = getCompletions('insert users ', dataProvider);
      expect(completions).toEqual(['id=', 'name=', 'age=']);
      expect(dataProvider.getFieldNames).toHaveBeenCalledWith('users');
    });

    it('should offer keywords and fields for select', () => {
      const [completions] = getCompletions('select users ', dataProvider);
      expect(completions).toEqual(['where', 'id', 'name', 'age']);
    });

    it('should offer --yes for bulk writes', () => {
      expect(getCompletions('delete users --', dataProvider)).toEqual([['--yes'], '--']);
      expect(getCompletions('drop_table users ', dataProvider)).toEqual([['--yes'], '']);
    });

    it('should offer set for update', () => {
      expect(getCompletions('update users s', dataProvider)).toEqual([['set'], 's']);
    });
  });

  it('should return nothing for unknown commands', () => {
    expect(getCompletions('frobnicate ', dataProvider)).toEqual([[], '']);
  });
});
