import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import {
  AGENT_ROUND_COLUMNS,
  MATCH_COLUMNS,
  type AgentRoundRow,
  type MatchRow,
} from "./types";
import {
  bindRow,
  openSqlite,
  readSqlFile,
  saveSqlite,
  type Database,
  type SqlValue,
} from "./sqlite";

export async function ensureParents(file: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
}

export function agentRoundsCsv(rows: AgentRoundRow[]): string {
  return stringify(rows, { header: true, columns: [...AGENT_ROUND_COLUMNS] });
}

export function matchesCsv(rows: MatchRow[]): string {
  return stringify(rows, { header: true, columns: [...MATCH_COLUMNS] });
}

export async function writeCsvs(
  agentRows: AgentRoundRow[],
  matchRows: MatchRow[],
  outPath: string,
  matchesOutPath: string,
): Promise<void> {
  await ensureParents(outPath);
  await ensureParents(matchesOutPath);
  await writeFile(outPath, agentRoundsCsv(agentRows));
  await writeFile(matchesOutPath, matchesCsv(matchRows));
}

function insertSql(table: string, columns: readonly string[]): string {
  const cols = columns.join(", ");
  const params = columns.map((c) => `@${c}`).join(", ");
  return `INSERT INTO ${table} (${cols}) VALUES (${params})`;
}

function insertAll<K extends string>(
  db: Database,
  table: string,
  columns: readonly K[],
  rows: Record<K, SqlValue>[],
): void {
  const stmt = db.prepare(insertSql(table, columns));
  try {
    for (const r of rows) stmt.run(bindRow(columns, r));
  } finally {
    stmt.free();
  }
}

/**
 * Replaces the agent_rounds and matches tables in the SQLite file at dbPath.
 * Returns false (after a warning) when either row set is empty.
 */
export async function writeSqlite(
  agentRows: AgentRoundRow[],
  matchRows: MatchRow[],
  dbPath: string,
): Promise<boolean> {
  if (agentRows.length === 0 || matchRows.length === 0) {
    console.warn("Warning: no data fetched; skipping SQLite write.");
    return false;
  }
  await ensureParents(dbPath);
  const schema = await readSqlFile("schema.sql");
  const db = await openSqlite(dbPath);
  try {
    db.run("BEGIN");
    try {
      db.exec(schema);
      insertAll(db, "agent_rounds", AGENT_ROUND_COLUMNS, agentRows);
      insertAll(db, "matches", MATCH_COLUMNS, matchRows);
      db.run("COMMIT");
    } catch (e) {
      db.run("ROLLBACK");
      throw e;
    }
    await saveSqlite(db, dbPath);
  } finally {
    db.close();
  }
  return true;
}
