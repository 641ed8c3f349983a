import { dbAll, openSqlite, readSqlFile } from "./sqlite";

export type NamedQuery = { title: string; sql: string };

export type QueryResult = { title: string; rows: unknown[] };

// Statements are separated by ';' and titled by the '-- ' line above them
export function splitQueries(text: string): NamedQuery[] {
  const out: NamedQuery[] = [];
  for (const chunk of text.split(";")) {
    const lines = chunk.split(/\r?\n/);
    const title =
      lines
        .find((l) => l.trim().startsWith("--"))
        ?.trim()
        .replace(/^--\s*/, "") ?? "";
    const sql = lines
      .filter((l) => !l.trim().startsWith("--"))
      .join("\n")
      .trim();
    if (sql) out.push({ title: title || `query ${out.length + 1}`, sql });
  }
  return out;
}

export async function loadExampleQueries(): Promise<NamedQuery[]> {
  return splitQueries(await readSqlFile("example_queries.sql"));
}

export async function runQueries(
  dbPath: string,
  queries: NamedQuery[],
): Promise<QueryResult[]> {
  const db = await openSqlite(dbPath, { mustExist: true });
  try {
    return queries.map((q) => ({ title: q.title, rows: dbAll(db, q.sql) }));
  } finally {
    db.close();
  }
}
