import type { EngineAdapter } from '@pmm-link/engines';
import type {
  CredentialStatus,
  DatabaseRecord,
  EngineId,
  IntegrationResult,
  MonitoringCredential,
  WorkflowSnapshot,
  WorkflowStep,
} from '@pmm-link/shared';
import { UnsupportedEngineError, ValidationError } from '../errors.js';

export const STEP_ORDER: readonly WorkflowStep[] = [
  'credentials',
  'engine',
  'discovery',
  'provisioning',
  'integration',
];

export type SecretField = 'doToken' | 'pmmPassword';

export interface SelectedDatabase {
  database: DatabaseRecord;
  credential: MonitoringCredential | null;
}

function stepIndex(step: WorkflowStep): number {
  return STEP_ORDER.indexOf(step);
}

/** A database can be picked for new monitoring only when online and not yet in PMM */
export function selectionBlocker(db: DatabaseRecord): string | null {
  if (db.monitored) return `${db.name} is already monitored as ${db.pmm_service_name}; remove it instead.`;
  if (db.status !== 'online') return `${db.name} is ${db.status} and cannot be monitored.`;
  return null;
}

/**
 * Per-browser-session state of the five-step workflow. Forward moves pass
 * through gates; moving back is always allowed. Secrets live only here, in memory.
 */
export class WorkflowSession {
  private current = 0;
  private secrets: Partial<Record<SecretField, string>> = {};
  private status: Record<SecretField, CredentialStatus> = {
    doToken: 'unknown',
    pmmPassword: 'unknown',
  };
  private engineId: EngineId | null = null;
  private privateNetwork = false;
  private selection: SelectedDatabase[] = [];

  get step(): WorkflowStep {
    const index = Math.min(this.current, stepIndex(this.reachable()));
    return STEP_ORDER[index] ?? 'credentials';
  }

  get doToken(): string | undefined {
    return this.secrets.doToken;
  }

  get pmmPassword(): string | undefined {
    return this.secrets.pmmPassword;
  }

  get engine(): EngineId | null {
    return this.engineId;
  }

  get usePrivate(): boolean {
    return this.privateNetwork;
  }

  /** Record the outcome of validating a secret; both valid moves to engine selection */
  recordCredential(field: SecretField, value: string, valid: boolean): void {
    if (!valid) {
      this.invalidate(field);
      return;
    }
    this.secrets[field] = value;
    this.status[field] = 'valid';
    if (this.current === 0 && this.credentialsValid()) {
      this.current = stepIndex('engine');
    }
  }

  /** A held secret was rejected upstream: forget it and return to step 1 */
  invalidate(field: SecretField): void {
    delete this.secrets[field];
    this.status[field] = 'invalid';
    this.current = 0;
  }

  selectEngine(adapter: EngineAdapter, usePrivate?: boolean): void {
    this.assertReachable('engine');
    if (!adapter.supported) {
      throw new UnsupportedEngineError(adapter.displayName, adapter.notice);
    }
    const network = usePrivate ?? this.privateNetwork;
    // Selected records carry endpoints of one engine on one network.
    if (this.engineId !== adapter.id || network !== this.privateNetwork) {
      this.selection = [];
    }
    this.engineId = adapter.id;
    this.privateNetwork = network;
    this.current = stepIndex('discovery');
  }

  /**
   * Replace the selection with freshly discovered records, in the given order.
   * Credentials already provided for databases that stay selected are kept.
   */
  select(databases: DatabaseRecord[]): void {
    this.assertReachable('discovery');
    if (databases.length === 0) {
      throw new ValidationError('Select at least one database.');
    }

    const seen = new Set<string>();
    for (const db of databases) {
      if (db.engine !== this.engineId) {
        throw new ValidationError(`${db.name} is not a ${this.engineId ?? 'selected engine'} database.`);
      }
      const blocker = selectionBlocker(db);
      if (blocker) throw new ValidationError(blocker);
      if (seen.has(db.id)) throw new ValidationError(`${db.name} is selected twice.`);
      seen.add(db.id);
    }

    const previous = new Map(this.selection.map((s) => [s.database.id, s.credential]));
    this.selection = databases.map((database) => ({
      database,
      credential: previous.get(database.id) ?? null,
    }));
    this.current = stepIndex('provisioning');
  }

  isSelected(dbId: string): boolean {
    return this.selection.some((s) => s.database.id === dbId);
  }

  setCredential(dbId: string, credential: MonitoringCredential): void {
    const entry = this.selection.find((s) => s.database.id === dbId);
    if (!entry) {
      throw new ValidationError(`Database ${dbId} is not selected.`);
    }
    entry.credential = credential;
  }

  selected(): readonly SelectedDatabase[] {
    return this.selection;
  }

  /** Databases that still block the move to integration */
  missingCredentials(): SelectedDatabase[] {
    return this.selection.filter((s) => !s.credential?.ready);
  }

  /** Furthest step whose gate is currently open */
  reachable(): WorkflowStep {
    if (!this.credentialsValid()) return 'credentials';
    if (!this.engineId) return 'engine';
    if (this.selection.length === 0) return 'discovery';
    if (this.missingCredentials().length > 0) return 'provisioning';
    return 'integration';
  }

  goTo(step: WorkflowStep): void {
    this.assertReachable(step);
    this.current = stepIndex(step);
  }

  /**
   * Drop databases that were registered, together with their credentials.
   * Failed ones stay selected so they can be retried.
   */
  completeIntegration(results: IntegrationResult[]): void {
    const done = new Set(results.filter((r) => r.ok).map((r) => r.db_id));
    this.selection = this.selection.filter((s) => !done.has(s.database.id));
    if (this.selection.length === 0) {
      this.current = stepIndex('discovery');
    }
  }

  /** Start over: the only way back to a blank session */
  reset(): void {
    this.current = 0;
    this.secrets = {};
    this.status = { doToken: 'unknown', pmmPassword: 'unknown' };
    this.engineId = null;
    this.privateNetwork = false;
    this.selection = [];
  }

  snapshot(): WorkflowSnapshot {
    return {
      step: this.step,
      reachable: this.reachable(),
      credentials: { doToken: this.status.doToken, pmmPassword: this.status.pmmPassword },
      engine: this.engineId,
      usePrivate: this.privateNetwork,
      selection: this.selection.map(({ database, credential }) => ({
        database,
        credential: credential
          ? { mode: credential.mode, username: credential.username, ready: credential.ready }
          : null,
      })),
    };
  }

  private credentialsValid(): boolean {
    return this.status.doToken === 'valid' && this.status.pmmPassword === 'valid';
  }

  private assertReachable(step: WorkflowStep): void {
    if (stepIndex(step) <= stepIndex(this.reachable())) return;

    switch (this.reachable()) {
      case 'credentials':
        throw new ValidationError('Validate the DigitalOcean token and PMM password first.');
      case 'engine':
        throw new ValidationError('Choose a supported engine first.');
      case 'discovery':
        throw new ValidationError('Select at least one database first.');
      default: {
        const names = this.missingCredentials().map((s) => s.database.name);
        throw new ValidationError(
          `Every selected database needs a ready monitoring credential (missing: ${names.join(', ')}).`,
        );
      }
    }
  }
}
