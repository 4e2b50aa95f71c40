import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export async function loadSchemaSql(): Promise<string> {
  return readFile(SCHEMA_SQL_PATH, 'utf-8');
}

/**
 * Applies the DDL through whatever multi-statement executor the caller has
 * (`pool.query` for node-postgres, `exec` for PGlite).
 */
export async function applySchema(
  exec: (sqlText: string) => Promise<unknown>,
): Promise<void> {
  const ddl = await loadSchemaSql();
  await exec(ddl);
}
