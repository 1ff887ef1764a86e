import 'dotenv/config';
import { defineConfig } from 'drizzle-kit';
import { LEDGER_SCHEMA_NAME } from './src/schema/_schema';

const url = process.env.DATABASE_URL;
if (!url) {
  throw new Error('DATABASE_URL environment variable is not set.');
}

export default defineConfig({
  schema: './src/schema/index.ts',
  out: './migrations',
  dialect: 'postgresql',
  dbCredentials: { url },
  schemaFilter: [LEDGER_SCHEMA_NAME],
  verbose: true,
  strict: true,
});
