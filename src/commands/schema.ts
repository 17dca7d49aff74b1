/**
 * Schema commands: export and import table definitions as YAML
 */

import { Command } from 'commander';
import { exportSchema, importSchema, parseSchemaDocument } from '../schema/schema-file.js';
import { atomicWriteFile, readFileSafe } from '../utils/fs.js';
import { output, outputSuccess } from '../utils/output.js';
import { SchemaError } from '../errors/index.js';
import { withDatabase, type GetGlobals } from './common.js';

export function createSchemaCommand(getGlobals: GetGlobals): Command {
  const cmd = new Command('schema').description('Export or import table definitions (YAML)');

  cmd
    .command('export')
    .description('Write every table definition as YAML')
    .argument('[file]', 'Output file (default: stdout)')
    .action(async (file: string | undefined) => {
      await withDatabase(getGlobals, async (db) => {
        const yaml = exportSchema(await db.listTables());
        if (file) {
          await atomicWriteFile(file, yaml);
          outputSuccess(`Schema written to: ${file}`);
        } else {
          process.stdout.write(yaml);
        }
      });
    });

  cmd
    .command('import')
    .description('Create the tables a YAML file defines; existing tables are skipped')
    .argument('<file>', 'Schema file')
    .action(async (file: string) => {
      await withDatabase(getGlobals, async (db) => {
        const content = await readFileSafe(file);
        if (content === null) {
          throw new SchemaError(`Schema file not found: ${file}`);
        }
        const result = await importSchema(db, parseSchemaDocument(content));

        const lines = [
          ...result.created.map((t) => `Created table '${t}'`),
          ...result.skipped.map((t) => `Skipped table '${t}' (already exists)`),
        ];
        output(result, lines.length > 0 ? lines.join('\n') : 'No tables in file.');
      });
    });

  return cmd;
}
