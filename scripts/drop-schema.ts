import 'dotenv/config';
import postgres from 'postgres';
import { loadDatabaseConfig } from '../src/config';
import { LEDGER_SCHEMA_NAME } from '../src/schema/_schema';

const sql = postgres(loadDatabaseConfig().url, { max: 1 });

async function dropSchema() {
  try {
    console.log(`Dropping ${LEDGER_SCHEMA_NAME} schema...`);
    await sql`DROP SCHEMA IF EXISTS ${sql(LEDGER_SCHEMA_NAME)} CASCADE`;
    await sql`CREATE SCHEMA ${sql(LEDGER_SCHEMA_NAME)}`;
    console.log(`✓ Schema ${LEDGER_SCHEMA_NAME} dropped and recreated`);
  } catch (error) {
    console.error('Error dropping schema:', error);
    throw error;
  } finally {
    await sql.end();
  }
}

dropSchema().catch(() => {
  process.exitCode = 1;
});
