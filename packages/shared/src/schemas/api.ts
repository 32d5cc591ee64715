import { z } from 'zod';
import { DEFAULT_MONITORING_USERNAME, WorkflowStep } from '../types/common.js';
import { RegistrationInstance } from './database.js';

// Secrets are optional in every body: the session supplies them once validated.
const DoToken = z.string().trim().optional();
const PmmPassword = z.string().optional();

// --- Credentials ---

export const ValidateTokenBody = z.object({
  do_token: DoToken,
});
export type ValidateTokenBody = z.infer<typeof ValidateTokenBody>;

export const ValidatePmmBody = z.object({
  pmm_password: PmmPassword,
});
export type ValidatePmmBody = z.infer<typeof ValidatePmmBody>;

// --- Discovery ---

export const DatabasesBody = z.object({
  do_token: DoToken,
  pmm_password: PmmPassword,
  engine: z.string().trim().min(1, 'engine is required'),
  use_private: z.boolean().optional(),
});
export type DatabasesBody = z.infer<typeof DatabasesBody>;

// --- User provisioning ---

export const CreateUserBody = z.object({
  do_token: DoToken,
  db_id: z.string().trim().min(1, 'db_id is required'),
  db_name: z.string().default(''),
  engine: z.string().trim().default('pg'),
  username: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{1,63}$/, 'username may only contain letters, digits, _ and -')
    .default(DEFAULT_MONITORING_USERNAME),
});
export type CreateUserBody = z.infer<typeof CreateUserBody>;

export const ManualCredentialBody = z.object({
  db_id: z.string().trim().min(1, 'db_id is required'),
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
});
export type ManualCredentialBody = z.infer<typeof ManualCredentialBody>;

// --- Registration ---

export const RemoveBody = z.object({
  pmm_password: PmmPassword,
  service_name: z.string().trim().min(1, 'service_name is required'),
  engine: z.string().trim().min(1, 'engine is required'),
});
export type RemoveBody = z.infer<typeof RemoveBody>;

export const IntegrateBody = z.object({
  pmm_password: PmmPassword,
  engine: z.string().trim().default('pg'),
  instance: RegistrationInstance,
});
export type IntegrateBody = z.infer<typeof IntegrateBody>;

// --- Workflow navigation ---

export const StepBody = z.object({
  step: WorkflowStep,
});
export type StepBody = z.infer<typeof StepBody>;

export const EngineBody = z.object({
  engine: z.string().trim().min(1, 'engine is required'),
  use_private: z.boolean().optional(),
});
export type EngineBody = z.infer<typeof EngineBody>;

export const SelectionBody = z.object({
  db_ids: z.array(z.string().trim().min(1)).min(1, 'select at least one database'),
});
export type SelectionBody = z.infer<typeof SelectionBody>;
