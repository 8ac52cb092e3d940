import { PostgresDialect } from "kysely";
import { defineConfig } from "kysely-ctl";
import { fileURLToPath } from "node:url";
import { Pool } from "pg";

export const MIGRATIONS_DIR = fileURLToPath(
  new URL("../database/migrations", import.meta.url),
);

export default defineConfig({
  dialect: new PostgresDialect({
    pool: new Pool({
      connectionString: process.env.DATABASE_URL,
    }),
  }),
  migrations: {
    migrationFolder: MIGRATIONS_DIR,
  },
});
