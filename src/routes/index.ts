/**
 * @file src/routes/index.ts
 * @description Экспорт всех routes
 */

export { createHealthRouter } from './health';
export { createChatRouter } from './chat';
export type { ChatRouterDependencies } from './chat';
