import { z } from 'zod';
import { CredentialMode, EngineId } from '../types/common.js';

/** A DigitalOcean managed database cluster as shown to the workflow UI */
export const DatabaseRecord = z.object({
  id: z.string(),
  name: z.string(),
  engine: EngineId,
  region: z.string(),
  host: z.string(),
  port: z.number().int(),
  num_nodes: z.number().int(),
  status: z.string(),
  monitored: z.boolean(),
  pmm_service_name: z.string(),
});
export type DatabaseRecord = z.infer<typeof DatabaseRecord>;

/** Manual follow-up the operator performs after registration */
export const PostStep = z.object({
  title: z.string(),
  description: z.string(),
  command: z.string().optional(),
});
export type PostStep = z.infer<typeof PostStep>;

export const MonitoringCredential = z.object({
  mode: CredentialMode,
  username: z.string(),
  password: z.string(),
  ready: z.boolean(),
});
export type MonitoringCredential = z.infer<typeof MonitoringCredential>;

/** Connection parameters handed to pmm-admin for one database */
export const RegistrationInstance = z.object({
  name: z.string().trim().min(1),
  host: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  username: z.string().min(1),
  password: z.string().min(1),
});
export type RegistrationInstance = z.infer<typeof RegistrationInstance>;

export const IntegrationResult = z.object({
  db_id: z.string(),
  name: z.string(),
  ok: z.boolean(),
  output: z.string(),
  message: z.string().optional(),
  post_steps: z.array(PostStep),
});
export type IntegrationResult = z.infer<typeof IntegrationResult>;

export const EngineInfo = z.object({
  id: EngineId,
  name: z.string(),
  supported: z.boolean(),
});
export type EngineInfo = z.infer<typeof EngineInfo>;
