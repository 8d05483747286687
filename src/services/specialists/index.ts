/**
 * @file src/services/specialists/index.ts
 * @description Сборка реестра специалистов при старте сервиса
 */

import config from '../../config';
import { SPECIALIST_DEFINITIONS } from '../../config/specialists';
import { logger } from '../../utils/logger';
import { SpecialistRegistry } from './registry';
import { RemoteSpecialist } from './remote';

export { SpecialistRegistry } from './registry';
export type { SpecialistCapability, SpecialistRequest } from './registry';
export { RemoteSpecialist, parseOutcome } from './remote';

/**
 * Создаёт замороженный реестр из включённых в конфиге специалистов
 */
export function createSpecialistRegistry(enabledIds: string[] = config.specialistsEnabled): SpecialistRegistry {
  const registry = new SpecialistRegistry();

  for (const definition of SPECIALIST_DEFINITIONS) {
    if (enabledIds.includes(definition.id)) {
      registry.register(new RemoteSpecialist(definition));
    }
  }

  const unknown = enabledIds.filter(id => !SPECIALIST_DEFINITIONS.some(def => def.id === id));
  if (unknown.length > 0) {
    logger.warn('Unknown specialists in SPECIALISTS_ENABLED ignored', { unknown });
  }

  logger.info('Specialist registry initialized', { specialists: registry.ids() });

  return registry.freeze();
}
