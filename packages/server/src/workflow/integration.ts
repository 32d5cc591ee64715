import type { SupportedEngineAdapter } from '@pmm-link/engines';
import type { IntegrationResult, RegistrationInstance } from '@pmm-link/shared';
import { RegistrationError, WorkflowError } from '../errors.js';
import { logger } from '../logger.js';
import type { SelectedDatabase } from './session.js';

/** The registration half of the pmm-admin wrapper */
export interface InstanceRegistrar {
  register(
    adapter: SupportedEngineAdapter,
    instance: RegistrationInstance,
    password: string,
  ): Promise<{ output: string }>;
}

/**
 * Register every selected database in order, one at a time. A failure is
 * recorded in that database's result and the run carries on.
 */
export async function integrateSelection(
  selection: readonly SelectedDatabase[],
  adapter: SupportedEngineAdapter,
  registrar: InstanceRegistrar,
  pmmPassword: string,
): Promise<IntegrationResult[]> {
  const results: IntegrationResult[] = [];

  for (const { database, credential } of selection) {
    const base = { db_id: database.id, name: database.name };

    if (!credential?.ready) {
      results.push({ ...base, ok: false, output: '', message: 'No monitoring credential.', post_steps: [] });
      continue;
    }

    const instance: RegistrationInstance = {
      name: database.name,
      host: database.host,
      port: database.port,
      username: credential.username,
      password: credential.password,
    };

    try {
      const { output } = await registrar.register(adapter, instance, pmmPassword);
      results.push({ ...base, ok: true, output, post_steps: adapter.postSteps(instance) });
    } catch (error) {
      if (!(error instanceof WorkflowError)) {
        logger.error({ err: error, service: database.name }, 'Unexpected registration failure');
      }
      results.push({
        ...base,
        ok: false,
        output: error instanceof RegistrationError ? error.output : '',
        message: error instanceof Error ? error.message : String(error),
        post_steps: [],
      });
    }
  }

  return results;
}
