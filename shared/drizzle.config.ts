import { defineConfig } from 'drizzle-kit';
import { loadSettings } from './config/settings';

// Paths are relative to the repository root, where the db:* scripts run.
export default defineConfig({
  schema: './shared/db/schema.ts',
  out: './shared/db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    url: loadSettings().database.url,
  },
  verbose: true,
  strict: true,
});
