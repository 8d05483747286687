/**
 * @file src/storage/database.ts
 * @description SQLite database initialization and management
 * @context Управляет подключением к базе данных (сессии и сообщения чата)
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import config from '../config';
import { logger } from '../utils/logger';

let db: Database.Database | null = null;

/**
 * Инициализация базы данных
 */
export function initDatabase(): Database.Database {
  if (db) return db;

  // Создаём директорию если не существует
  const dataDir = config.dataPath;
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const dbPath = config.databasePath;

  logger.info('Initializing database', { path: dbPath });

  db = new Database(dbPath);

  // Enable WAL mode for better performance
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  createTables(db);

  logger.info('Database initialized successfully');

  return db;
}

/**
 * Создание таблиц (idempotent)
 */
export function createTables(database: Database.Database): void {
  // Sessions table
  database.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id)
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at)
  `);

  // Messages table
  database.exec(`
    CREATE TABLE IF NOT EXISTS messages (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      session_id TEXT NOT NULL,
      role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
      content TEXT NOT NULL,
      agent_name TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_messages_session_id ON messages(session_id, seq)
  `);

  logger.info('Database tables created/verified');
}

/**
 * Получение инстанса базы данных
 */
export function getDatabase(): Database.Database {
  if (!db) {
    return initDatabase();
  }
  return db;
}

/**
 * Закрытие базы данных
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database closed');
  }
}

export default {
  initDatabase,
  getDatabase,
  closeDatabase,
};
