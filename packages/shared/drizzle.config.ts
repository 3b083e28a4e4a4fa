import { defineConfig } from 'drizzle-kit';
import { config } from 'dotenv';
import { resolve } from 'path';

config({ path: resolve(process.cwd(), '.env') });

// drizzle-kit resolves these against the working directory; the db:* scripts run from the repo root
export default defineConfig({
  schema: './packages/shared/src/db/schema.ts',
  out: './packages/shared/drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/vidfarm',
  },
});
