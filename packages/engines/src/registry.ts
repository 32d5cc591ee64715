import type { EngineInfo } from '@pmm-link/shared';
import type { EngineAdapter } from './types.js';

export class EngineRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineRegistryError';
  }
}

export interface EngineRegistry {
  /** Look up an adapter by id or alias */
  resolve(id: string): EngineAdapter | undefined;
  /** Canonical adapters in registration order */
  list(): EngineAdapter[];
  /** Engine metadata as served by GET /api/engines */
  describe(): EngineInfo[];
}

/**
 * Builds a registry keyed by engine id plus any aliases.
 * Throws on duplicate ids or aliases that collide with an existing key.
 */
export function createEngineRegistry(
  adapters: EngineAdapter[],
  aliases: Record<string, string> = {},
): EngineRegistry {
  const byKey = new Map<string, EngineAdapter>();

  for (const adapter of adapters) {
    if (byKey.has(adapter.id)) {
      throw new EngineRegistryError(`Duplicate engine id: "${adapter.id}"`);
    }
    byKey.set(adapter.id, adapter);
  }

  for (const [alias, target] of Object.entries(aliases)) {
    const adapter = byKey.get(target);
    if (!adapter) {
      throw new EngineRegistryError(`Alias "${alias}" points to unknown engine "${target}"`);
    }
    if (byKey.has(alias)) {
      throw new EngineRegistryError(`Alias "${alias}" collides with an existing engine key`);
    }
    byKey.set(alias, adapter);
  }

  const canonical = [...adapters];

  return {
    resolve: (id) => byKey.get(id),
    list: () => [...canonical],
    describe: () =>
      canonical.map((a) => ({ id: a.id, name: a.displayName, supported: a.supported })),
  };
}
