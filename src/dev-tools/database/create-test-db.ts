import { PGlite } from "@electric-sql/pglite";
import { Kysely, Migrator } from "kysely";
import { PGliteDialect } from "kysely-pglite-dialect";
import type { DatabaseExecutor } from "../../modules/shared/infra/db.js";
import type { DB } from "../../modules/shared/infra/db-schema.js";
import { ESMFileMigrationProvider } from "./ESMFileMigrationProvider.js";

/**
 * In-memory Postgres (PGlite) migrated with the production migrations.
 * One session: concurrent transactions queue behind each other.
 */
export async function createTestDb(): Promise<DatabaseExecutor> {
  const db = new Kysely<DB>({
    dialect: new PGliteDialect(new PGlite()),
  });

  const migrator = new Migrator({
    db,
    provider: new ESMFileMigrationProvider(),
  });

  const { error } = await migrator.migrateToLatest();

  if (error) {
    throw new Error(`Error migrating database: ${String(error)}`);
  }

  return db;
}
