/**
 * @file src/storage/index.ts
 * @description Экспорт storage модулей
 */

export { initDatabase, getDatabase, closeDatabase, createTables } from './database';
export * from './conversations';
