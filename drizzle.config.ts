/**
 * Drizzle Kit Configuration
 *
 * Used by `npm run db:studio` to browse persisted session records.
 * The table itself is created at startup by src/storage/migrate.ts.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',
  out: './drizzle',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH || './interview-copilot.db',
  },
  verbose: true,
  strict: true,
});
