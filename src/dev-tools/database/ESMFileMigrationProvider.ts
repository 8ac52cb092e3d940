// biome-ignore assist/source/organizeImports: The editor does not behave correctly with this import
import type { Migration, MigrationProvider } from "kysely";
import { promises as fs } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { MIGRATIONS_DIR } from "../../../.config/kysely.config.js";

const MIGRATION_FILE = /^(?!.*\.d\.ts$).+\.(ts|js)$/;

// https://github.com/kysely-org/kysely/issues/277
export class ESMFileMigrationProvider implements MigrationProvider {
  constructor(private overridePath?: string) {}

  async getMigrations(): Promise<Record<string, Migration>> {
    const migrations: Record<string, Migration> = {};
    const resolvedPath = path.resolve(this.overridePath ?? MIGRATIONS_DIR);

    const files = (await fs.readdir(resolvedPath))
      .filter((fileName) => MIGRATION_FILE.test(fileName))
      .sort();
    if (files.length === 0) {
      throw new Error(`No migrations found in ${resolvedPath}`);
    }
    for (const fileName of files) {
      const moduleUrl = pathToFileURL(path.join(resolvedPath, fileName)).href;
      const migration: unknown = await import(moduleUrl);
      if (!isMigration(migration)) {
        throw new Error(`Migration ${fileName} does not export up()`);
      }
      migrations[fileName.substring(0, fileName.lastIndexOf("."))] = migration;
    }

    return migrations;
  }
}

function isMigration(value: unknown): value is Migration {
  return (
    typeof value === "object" &&
    value !== null &&
    "up" in value &&
    typeof value.up === "function"
  );
}
