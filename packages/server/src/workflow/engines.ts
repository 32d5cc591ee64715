import type { EngineAdapter, EngineRegistry, SupportedEngineAdapter } from '@pmm-link/engines';
import { UnsupportedEngineError, ValidationError } from '../errors.js';

export function requireEngine(registry: EngineRegistry, id: string): EngineAdapter {
  const adapter = registry.resolve(id);
  if (!adapter) {
    throw new ValidationError(`Unsupported engine: ${id}`);
  }
  return adapter;
}

/** Resolve an engine that may be discovered and registered */
export function requireSupportedEngine(
  registry: EngineRegistry,
  id: string,
): SupportedEngineAdapter {
  const adapter = requireEngine(registry, id);
  if (!adapter.supported) {
    throw new UnsupportedEngineError(adapter.displayName, adapter.notice);
  }
  return adapter;
}
