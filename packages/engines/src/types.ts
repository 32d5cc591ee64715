import type { EngineId, PostStep, RegistrationInstance } from '@pmm-link/shared';

interface EngineBase {
  id: EngineId;
  displayName: string;
  /** Engine slug used by the DigitalOcean databases API */
  engineFilter: string;
  /** Port assumed when the provider omits one */
  defaultPort: number;
  /** Service type understood by `pmm-admin add` / `pmm-admin remove` */
  serviceType: string;
}

/** An engine that can be provisioned and registered end to end */
export interface SupportedEngineAdapter extends EngineBase {
  supported: true;
  /** Body for POST /databases/{id}/users */
  userFields: (username: string) => Record<string, unknown>;
  /** Arguments after the pmm-admin command itself */
  buildAddArgs: (instance: RegistrationInstance, serverUrl: string) => string[];
  postSteps: (instance: RegistrationInstance) => PostStep[];
}

/** Listed for visibility only; never selectable */
export interface UnsupportedEngineAdapter extends EngineBase {
  supported: false;
  notice: string;
}

export type EngineAdapter = SupportedEngineAdapter | UnsupportedEngineAdapter;
