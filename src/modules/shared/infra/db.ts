import { Kysely, PostgresDialect } from "kysely";
import { Pool } from "pg";
import type { DB } from "./db-schema.js";

export type DatabaseExecutor = Kysely<DB>;

export function createDb(connectionString: string): DatabaseExecutor {
  return new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });
}

export class DatabaseError extends Error {
  constructor({ message, cause }: { message: string; cause: unknown }) {
    super(message);
    this.name = "DatabaseError";
    this.cause = cause;
  }
}

export async function dbQuery<A>(run: () => Promise<A>, errorMessage: string) {
  try {
    return await run();
  } catch (error) {
    throw new DatabaseError({ message: errorMessage, cause: error });
  }
}

/**
 * Runs `work` inside the caller's transaction when `db` already is one,
 * otherwise opens a new transaction. Lets repositories that need atomic
 * multi-statement writes be composed into a larger unit of work.
 */
export async function inTransaction<A>(
  db: DatabaseExecutor,
  work: (trx: DatabaseExecutor) => Promise<A>,
): Promise<A> {
  if (db.isTransaction) {
    return await work(db);
  }
  return await db.transaction().execute(work);
}

export function nowIso(): string {
  return new Date().toISOString();
}
