import fs from "fs-extra";
import path from "path";
import { pathToFileURL } from "url";
import { inTransaction, PgClient, withPg } from "../pipeline/db";
import { loadConfig } from "../pipeline/env";
import { info } from "../pipeline/log";

async function ensureMigrationsTable(client: PgClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT now()
    );
  `);
}

async function appliedMigrations(client: PgClient): Promise<Set<string>> {
  const res = await client.query<{ name: string }>(
    "SELECT name FROM _migrations ORDER BY id ASC"
  );
  return new Set(res.rows.map((r) => r.name));
}

/** Applies pending `*.sql` files from `dir` in name order; resolves to the applied names */
export async function migrate(client: PgClient, dir: string): Promise<string[]> {
  await ensureMigrationsTable(client);
  const done = await appliedMigrations(client);
  const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const applied: string[] = [];
  for (const f of files) {
    if (done.has(f)) continue;
    const sql = await fs.readFile(path.join(dir, f), "utf8");
    await inTransaction(client, async () => {
      await client.query(sql);
      await client.query("INSERT INTO _migrations(name) VALUES($1)", [f]);
    });
    info("db.migration.applied", { name: f });
    applied.push(f);
  }
  return applied;
}

async function main() {
  const config = loadConfig();
  const dir = path.resolve("db/migrations");
  const applied = await withPg(config.databaseUrl, (c) => migrate(c, dir));
  console.log(applied.length ? `Applied ${applied.join(", ")}` : "Database is up to date");
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
