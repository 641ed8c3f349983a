import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import initSqlJs, {
  type Database,
  type ParamsObject,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";

export type { Database, SqlValue };

const SQL_DIR = fileURLToPath(new URL("../sql/", import.meta.url));

export async function readSqlFile(name: string): Promise<string> {
  return readFile(path.join(SQL_DIR, name), "utf8");
}

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Opens the SQLite file at dbPath in memory. A missing file starts an empty
 * database unless mustExist is set. Changes reach disk only via saveSqlite.
 */
export async function openSqlite(
  dbPath: string,
  opts: { mustExist?: boolean } = {},
): Promise<Database> {
  const SQL = await loadEngine();
  let bytes: Buffer | null = null;
  try {
    bytes = await readFile(dbPath);
  } catch (e) {
    if (opts.mustExist || !isMissing(e)) throw e;
  }
  return new SQL.Database(bytes);
}

export async function saveSqlite(db: Database, dbPath: string): Promise<void> {
  await writeFile(dbPath, db.export());
}

export function dbAll(
  db: Database,
  sql: string,
  params?: ParamsObject,
): ParamsObject[] {
  const stmt = db.prepare(sql);
  try {
    if (params) stmt.bind(params);
    const rows: ParamsObject[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

// Named parameters as @column
export function bindRow<K extends string>(
  columns: readonly K[],
  row: Record<K, SqlValue>,
): ParamsObject {
  const out: ParamsObject = {};
  for (const c of columns) out[`@${c}`] = row[c];
  return out;
}
