import { config } from '@api/config';
import { createConnection } from './connection';
import { applySchema } from './bootstrap';

async function main() {
  const { pool, close } = createConnection(config.database);
  try {
    await applySchema((ddl) => pool.query(ddl));
    console.warn('[DB] Schema applied');
  } finally {
    await close();
  }
}

main().catch((err) => {
  console.error('[DB] Schema bootstrap failed:', err);
  process.exit(1);
});
