/** SQLite 유틸리티. 호출마다 열고 닫는 패턴. */

import Database from "better-sqlite3";

type DatabaseSync = Database.Database;
export type { DatabaseSync };

export type SqliteRunOptions = {
  /** 연결 직후 실행할 PRAGMA 목록 (예: ["journal_mode=WAL"]) */
  pragmas?: string[];
};

function open_sqlite(db_path: string, options?: SqliteRunOptions): DatabaseSync {
  const db = new Database(db_path);
  for (const p of options?.pragmas ?? []) db.pragma(p);
  return db;
}

/** DB를 열고 콜백 실행 후 닫는다. 에러는 호출자에게 전파. */
export function with_sqlite<T>(
  db_path: string,
  run: (db: DatabaseSync) => T,
  options?: SqliteRunOptions,
): T {
  const db = open_sqlite(db_path, options);
  try {
    return run(db);
  } finally {
    db.close();
  }
}
