import type { ApplicationDocument } from './services/schemas';
import type { ModelStatus } from './services/modelResolver';
import type { SystemStatus } from './services/appContext';

export type {
  ApplicationDocument,
  DocumentType,
  InterviewPreparation,
  JobDescription,
  ManualJobInput,
  UserPreferences,
  UserProfile,
} from './services/schemas';
export type { HealthSummary, ModelStatus } from './services/modelResolver';
export type { SystemStatus } from './services/appContext';

export interface ApplicationResult {
  analysis: string;
  documents: ApplicationDocument[];
}

export interface StatusResponse {
  system: SystemStatus;
  models: ModelStatus;
}

export interface ApiError {
  error: string;
  details?: string;
  kind?: string;
}
