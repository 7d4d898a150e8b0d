import fs from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import type { Logger } from "../config/logger";
import { withQueryTimeout } from "./postgres";

export async function runMigrations(
  pool: Pool,
  logger: Logger,
  queryTimeoutMs: number,
  migrationsDir = path.join(process.cwd(), "migrations")
): Promise<{ applied: string[] }> {
  const applied: string[] = [];
  await withQueryTimeout(queryTimeoutMs, "migration bootstrap", () => pool.query(`
    CREATE TABLE IF NOT EXISTS library_migrations (
      id text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `));

  const files = (await fs.readdir(migrationsDir))
    .filter((f) => f.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  for (const file of files) {
    const exists = await withQueryTimeout(
      queryTimeoutMs,
      "migration check",
      () => pool.query("SELECT 1 FROM library_migrations WHERE id = $1", [file])
    );
    if (exists.rowCount && exists.rowCount > 0) continue;

    const sql = await fs.readFile(path.join(migrationsDir, file), "utf8");
    const client = await pool.connect();
    try {
      await withQueryTimeout(queryTimeoutMs, "migration begin", () => client.query("BEGIN"));
      try {
        await withQueryTimeout(queryTimeoutMs, "migration", () => client.query(sql));
        await withQueryTimeout(queryTimeoutMs, "migration record", () =>
          client.query("INSERT INTO library_migrations (id) VALUES ($1)", [file])
        );
        await withQueryTimeout(queryTimeoutMs, "migration commit", () => client.query("COMMIT"));
        applied.push(file);
        logger.info("migration_applied", { file });
      } catch (error) {
        await withQueryTimeout(queryTimeoutMs, "migration rollback", () => client.query("ROLLBACK"));
        throw error;
      }
    } finally {
      client.release();
    }
  }
  return { applied };
}
