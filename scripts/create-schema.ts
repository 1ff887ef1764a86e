import 'dotenv/config';
import postgres from 'postgres';
import { loadDatabaseConfig } from '../src/config';
import { LEDGER_SCHEMA_NAME } from '../src/schema/_schema';

const sql = postgres(loadDatabaseConfig().url, { max: 1 });

async function createSchema() {
  try {
    console.log(`Creating ${LEDGER_SCHEMA_NAME} schema...`);
    await sql`CREATE SCHEMA IF NOT EXISTS ${sql(LEDGER_SCHEMA_NAME)}`;
    console.log(`✓ Schema ${LEDGER_SCHEMA_NAME} created successfully`);
    console.log('  Next: npm run db:push to create the tables');
  } catch (error) {
    console.error('Error creating schema:', error);
    throw error;
  } finally {
    await sql.end();
  }
}

createSchema().catch(() => {
  process.exitCode = 1;
});
