import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { normalize_text, now_iso } from "../utils/common.js";
import { with_sqlite, type DatabaseSync } from "../utils/sqlite-helper.js";

export type SavedTask = {
  id: number;
  goal: string;
  created_at: string;
};

const INSTRUCTIONS_KEY = "custom_instructions";

/** 저장된 작업 목록과 사용자 지시문. 대화 상태는 저장하지 않는다. */
export class TaskLibrary {
  readonly sqlite_path: string;

  constructor(data_dir: string) {
    mkdirSync(data_dir, { recursive: true });
    this.sqlite_path = join(data_dir, "shell-agent.db");
    this.with_db((db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS saved_tasks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          goal TEXT NOT NULL UNIQUE,
          created_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS settings (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `);
    });
  }

  private with_db<T>(run: (db: DatabaseSync) => T): T {
    return with_sqlite(this.sqlite_path, run, { pragmas: ["journal_mode=WAL"] });
  }

  list_tasks(): SavedTask[] {
    return this.with_db((db) => db
      .prepare("SELECT id, goal, created_at FROM saved_tasks ORDER BY id ASC")
      .all()
      .flatMap((row) => to_saved_task(row)));
  }

  get_task(id: number): SavedTask | null {
    return this.with_db((db) => {
      const row: unknown = db.prepare("SELECT id, goal, created_at FROM saved_tasks WHERE id = ?").get(id);
      return to_saved_task(row)[0] ?? null;
    });
  }

  /** 빈 문자열이나 이미 있는 목표면 false. */
  add_task(goal: string): boolean {
    const text = normalize_text(goal);
    if (!text) return false;
    return this.with_db((db) => db
      .prepare("INSERT OR IGNORE INTO saved_tasks (goal, created_at) VALUES (?, ?)")
      .run(text, now_iso()).changes > 0);
  }

  remove_task(id: number): boolean {
    return this.with_db((db) => db.prepare("DELETE FROM saved_tasks WHERE id = ?").run(id).changes > 0);
  }

  get_instructions(): string {
    return this.with_db((db) => {
      const row: unknown = db.prepare("SELECT value FROM settings WHERE key = ?").get(INSTRUCTIONS_KEY);
      if (!row || typeof row !== "object" || !("value" in row)) return "";
      return typeof row.value === "string" ? row.value : "";
    });
  }

  set_instructions(text: string): void {
    const value = String(text || "").trim();
    if (!value) {
      this.clear_instructions();
      return;
    }
    this.with_db((db) => {
      db.prepare(`
        INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `).run(INSTRUCTIONS_KEY, value, now_iso());
    });
  }

  clear_instructions(): void {
    this.with_db((db) => {
      db.prepare("DELETE FROM settings WHERE key = ?").run(INSTRUCTIONS_KEY);
    });
  }
}

function to_saved_task(row: unknown): SavedTask[] {
  if (!row || typeof row !== "object") return [];
  if (!("id" in row) || !("goal" in row) || !("created_at" in row)) return [];
  const { id, goal, created_at } = row;
  if (typeof id !== "number" || typeof goal !== "string" || typeof created_at !== "string") return [];
  return [{ id, goal, created_at }];
}
