import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closePostgres, initializePostgres } from "../infra/postgres.js";
import { getAppLogger, type AppLogger } from "../logging/logger.js";

/** The slice of a pg Pool the runner uses. */
export interface MigrationPool {
  connect(): Promise<{
    query(text: string, values?: unknown[]): Promise<{ rowCount?: number | null }>;
    release(): void;
  }>;
}

export interface RunMigrationsOptions {
  migrationsDir?: string;
  logger?: AppLogger;
  pool?: MigrationPool;
}

interface MigrationFile {
  id: string; // numeric ordering extracted from prefix
  filename: string;
  sql: string;
}

// src/scripts (or dist/src/scripts) -> repository root migrations/
const DEFAULT_DIR = (() => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const levelsUp = here.split(path.sep).includes("dist") ? "../../../migrations" : "../../migrations";
  return path.resolve(here, levelsUp);
})();

export async function loadMigrations(migrationsDir: string = DEFAULT_DIR): Promise<MigrationFile[]> {
  const entries = await readdir(migrationsDir);
  const migrations: MigrationFile[] = [];
  for (const entry of entries) {
    const match = /^(\d+)_.*\.sql$/u.exec(entry);
    if (!match) continue;
    const sql = await readFile(path.join(migrationsDir, entry), "utf8");
    migrations.push({ id: match[1], filename: entry, sql });
  }
  return migrations.sort((a, b) => a.id.localeCompare(b.id, undefined, { numeric: true }));
}

export async function runMigrations(options: RunMigrationsOptions = {}): Promise<void> {
  const logger = options.logger ?? getAppLogger();
  const pool: MigrationPool = options.pool ?? (await initializePostgres());
  const migrations = await loadMigrations(options.migrationsDir);
  const client = await pool.connect();
  try {
    await client.query(`CREATE TABLE IF NOT EXISTS _migrations(
      id TEXT PRIMARY KEY,
      filename TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )`);

    for (const migration of migrations) {
      const applied = await client.query("SELECT 1 FROM _migrations WHERE id = $1", [migration.id]);
      if (applied.rowCount && applied.rowCount > 0) {
        logger.debug?.({ id: migration.id, filename: migration.filename }, "migration.skip");
        continue;
      }

      logger.info?.({ id: migration.id, filename: migration.filename }, "migration.apply.begin");
      try {
        await client.query("BEGIN");
        await client.query(migration.sql);
        await client.query("INSERT INTO _migrations(id, filename) VALUES($1,$2)", [migration.id, migration.filename]);
        await client.query("COMMIT");
        logger.info?.({ id: migration.id }, "migration.apply.success");
      } catch (err) {
        await client.query("ROLLBACK");
        logger.error?.({ id: migration.id, err }, "migration.apply.failed");
        throw err;
      }
    }
  } finally {
    client.release();
  }
  logger.info?.({ count: migrations.length }, "migrations.complete");
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const logger = getAppLogger();
  runMigrations({ logger })
    .catch((err: unknown) => {
      logger.error?.({ err }, "migrations.run_failed");
      process.exitCode = 1;
    })
    .finally(() => closePostgres().catch((err: unknown) => logger.error?.({ err }, "infra.postgres.close_failed")));
}
