// Types
export {
  EngineId,
  WorkflowStep,
  CredentialStatus,
  CredentialMode,
  ErrorCode,
  DEFAULT_SERVER_PORT,
  DEFAULT_PMM_BASE_URL,
  DEFAULT_DO_API_BASE,
  DEFAULT_MONITORING_USERNAME,
  DO_REQUEST_TIMEOUT_MS,
} from './types/common.js';
export type {
  CredentialView,
  SelectedDatabaseView,
  WorkflowSnapshot,
} from './types/workflow.js';

// Schemas: databases
export {
  DatabaseRecord,
  PostStep,
  MonitoringCredential,
  RegistrationInstance,
  IntegrationResult,
  EngineInfo,
} from './schemas/database.js';

// Schemas: request bodies
export {
  ValidateTokenBody,
  ValidatePmmBody,
  DatabasesBody,
  CreateUserBody,
  ManualCredentialBody,
  RemoveBody,
  IntegrateBody,
  StepBody,
  EngineBody,
  SelectionBody,
} from './schemas/api.js';
