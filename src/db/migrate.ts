import fs from "fs-extra";
import path from "path";
import { fileURLToPath } from "url";
import { Client } from "pg";
import { ENV } from "../pipeline/env";
import { error, errorMessage, info } from "../pipeline/log";
import { redactUrl } from "../pipeline/run_db";

const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../db/migrations");

async function ensureMigrationsTable(client: Client) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT now()
    );
  `);
}

async function appliedMigrations(client: Client): Promise<Set<string>> {
  const res = await client.query<{ name: string }>("SELECT name FROM _migrations ORDER BY id ASC");
  return new Set(res.rows.map((r) => r.name));
}

async function applyMigration(client: Client, name: string, sql: string) {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query("INSERT INTO _migrations(name) VALUES($1)", [name]);
    await client.query("COMMIT");
    info("migrate.applied", { name });
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  }
}

async function main() {
  const client = new Client({ connectionString: ENV.databaseUrl });
  await client.connect();
  info("migrate.connected", { url: redactUrl(ENV.databaseUrl), dir: MIGRATIONS_DIR });
  try {
    await ensureMigrationsTable(client);
    const done = await appliedMigrations(client);
    const files = (await fs.readdir(MIGRATIONS_DIR)).filter((f) => f.endsWith(".sql")).sort();
    for (const f of files) {
      if (done.has(f)) continue;
      const sql = await fs.readFile(path.join(MIGRATIONS_DIR, f), "utf8");
      await applyMigration(client, f, sql);
    }
  } finally {
    await client.end();
  }
}

main().catch((e) => {
  error("migrate.fail", { error: errorMessage(e) });
  process.exit(1);
});
