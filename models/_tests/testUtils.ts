import Database from 'better-sqlite3';
import { initDb } from '../db';
import runMigrations from '../runMigrations';

export function setupTestDb(): Database.Database {
  const db = initDb(':memory:');
  runMigrations(db);
  return db;
}

export function cleanTestDb(db: Database.Database): void {
  // Children before parents
  db.exec(`
    DELETE FROM interactions;
    DELETE FROM documents;
    DELETE FROM analysis_cache;
    DELETE FROM search_history;
    DELETE FROM telemetry_events;
  `);
}

/** Inserts a document directly, bypassing content hashing. */
export function insertDocument(db: Database.Database, id: string, overrides: { pageCount?: number; handles?: string[] } = {}): void {
  const handles = overrides.handles ?? ['file-a'];
  db.prepare(`
    INSERT INTO documents (id, display_name, content_hash, byte_size, page_count, chunk_count, chunk_handles_json, processed_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(id, `${id}.pdf`, `hash-${id}`, 100, overrides.pageCount ?? 10, handles.length, JSON.stringify(handles), Date.now());
}
