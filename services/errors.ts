export type ModelErrorKind = 'ServiceUnavailable' | 'NoModelsAvailable' | 'NoWorkingModel';

export interface ModelError {
  kind: ModelErrorKind;
  message: string;
  /** What the user can do about it, printed by the CLI and returned by the API */
  remediation: string;
}

export type Result<T, E = ModelError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function serviceUnavailable(baseUrl: string): ModelError {
  return {
    kind: 'ServiceUnavailable',
    message: `Ollama is not reachable at ${baseUrl}`,
    remediation: 'Start the Ollama service (`ollama serve`). Install it from https://ollama.com/download if needed.',
  };
}

export function noModelsAvailable(): ModelError {
  return {
    kind: 'NoModelsAvailable',
    message: 'No models are installed in Ollama',
    remediation: "Download at least one model with 'ollama pull <model-name>'.",
  };
}

export function noWorkingModel(message = 'No working LLM model available'): ModelError {
  return {
    kind: 'NoWorkingModel',
    message,
    remediation: 'All configured models failed their health check. Check the Ollama logs and your model downloads.',
  };
}

export class AssistantError extends Error {
  constructor(message: string, readonly details?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ModelUnavailableError extends AssistantError {
  readonly kind: ModelErrorKind;

  constructor(readonly modelError: ModelError) {
    super(modelError.message, modelError.remediation);
    this.kind = modelError.kind;
  }
}

export class DocumentProcessingError extends AssistantError {}

export class ConfigurationError extends AssistantError {}

export class ValidationError extends AssistantError {}

export class NetworkError extends AssistantError {}

/** Convert a failed model result into a thrown ModelUnavailableError. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new ModelUnavailableError(result.error);
  return result.value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface HttpError {
  status: number;
  body: { error: string; details?: string; kind?: ModelErrorKind };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof ModelUnavailableError) {
    return { status: 503, body: { error: error.message, details: error.details, kind: error.kind } };
  }
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: error.message, details: error.details } };
  }
  if (error instanceof DocumentProcessingError) {
    return { status: 422, body: { error: error.message, details: error.details } };
  }
  if (error instanceof NetworkError) {
    return { status: 502, body: { error: error.message, details: error.details } };
  }
  return { status: 500, body: { error: errorMessage(error) } };
}
