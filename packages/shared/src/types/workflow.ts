import type { DatabaseRecord } from '../schemas/database.js';
import type { CredentialMode, CredentialStatus, EngineId, WorkflowStep } from './common.js';

/** Credential state of one selected database, without its password */
export interface CredentialView {
  mode: CredentialMode;
  username: string;
  ready: boolean;
}

export interface SelectedDatabaseView {
  database: DatabaseRecord;
  credential: CredentialView | null;
}

/** Session state returned to the browser; never carries secrets */
export interface WorkflowSnapshot {
  step: WorkflowStep;
  /** Furthest step the gates currently allow */
  reachable: WorkflowStep;
  credentials: {
    doToken: CredentialStatus;
    pmmPassword: CredentialStatus;
  };
  engine: EngineId | null;
  usePrivate: boolean;
  selection: SelectedDatabaseView[];
}
