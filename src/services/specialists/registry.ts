/**
 * @file src/services/specialists/registry.ts
 * @description Контракт специалиста и реестр id → capability
 * @context Реестр заполняется один раз при старте и замораживается;
 *          дальше только lookup, безопасно разделяется между параллельными run'ами
 * @affects pipeline/gate.ts, pipeline/invocation.ts
 */

import { SpecialistOutcome } from '../../types/pipeline';

export interface SpecialistRequest {
  query: string;
  sessionId?: string;
  userId: string;
  requestId: string;
}

/**
 * Доменный специалист (performance, budget, delivery, ...)
 */
export interface SpecialistCapability {
  readonly id: string;
  readonly description: string;
  handle(request: SpecialistRequest, signal: AbortSignal): Promise<SpecialistOutcome>;
}

export class SpecialistRegistry {
  private readonly specialists = new Map<string, SpecialistCapability>();
  private frozen = false;

  constructor(specialists: SpecialistCapability[] = []) {
    specialists.forEach(specialist => this.register(specialist));
  }

  register(specialist: SpecialistCapability): this {
    if (this.frozen) {
      throw new Error(`Specialist registry is frozen, cannot register "${specialist.id}"`);
    }
    if (this.specialists.has(specialist.id)) {
      throw new Error(`Specialist "${specialist.id}" is already registered`);
    }
    this.specialists.set(specialist.id, specialist);
    return this;
  }

  /**
   * Запрещает дальнейшую регистрацию
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(id: string): SpecialistCapability | undefined {
    return this.specialists.get(id);
  }

  has(id: string): boolean {
    return this.specialists.has(id);
  }

  ids(): string[] {
    return Array.from(this.specialists.keys());
  }

  size(): number {
    return this.specialists.size;
  }
}
