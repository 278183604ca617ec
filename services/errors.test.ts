import { describe, expect, it } from 'vitest';
import {
  AssistantError,
  DocumentProcessingError,
  ModelUnavailableError,
  NetworkError,
  ValidationError,
  fail,
  noModelsAvailable,
  noWorkingModel,
  ok,
  serviceUnavailable,
  toHttpError,
  unwrap,
} from './errors';

describe('model errors', () => {
  it('carries remediation for each kind', () => {
    expect(serviceUnavailable('http://localhost:11434')).toEqual({
      kind: 'ServiceUnavailable',
      message: 'Ollama is not reachable at http://localhost:11434',
      remediation: 'Start the Ollama service (`ollama serve`). Install it from https://ollama.com/download if needed.',
    });
    expect(noModelsAvailable().remediation).toBe("Download at least one model with 'ollama pull <model-name>'.");
    expect(noWorkingModel().message).toBe('No working LLM model available');
    expect(noWorkingModel('degraded').message).toBe('degraded');
  });

  it('unwraps a success and throws a failure', () => {
    expect(unwrap(ok(42))).toBe(42);

    const error = noModelsAvailable();
    expect(() => unwrap(fail(error))).toThrow(ModelUnavailableError);
    try {
      unwrap(fail(error));
    } catch (thrown) {
      expect(thrown).toBeInstanceOf(AssistantError);
      expect(thrown).toMatchObject({ name: 'ModelUnavailableError', kind: 'NoModelsAvailable' });
    }
  });
});

describe('toHttpError', () => {
  it('maps model errors to 503 with their kind', () => {
    expect(toHttpError(new ModelUnavailableError(noWorkingModel()))).toEqual({
      status: 503,
      body: {
        error: 'No working LLM model available',
        details: 'All configured models failed their health check. Check the Ollama logs and your model downloads.',
        kind: 'NoWorkingModel',
      },
    });
  });

  it('maps client and upstream errors', () => {
    expect(toHttpError(new ValidationError('Invalid request', 'email: Invalid email'))).toEqual({
      status: 400,
      body: { error: 'Invalid request', details: 'email: Invalid email' },
    });
    expect(toHttpError(new DocumentProcessingError('Failed to parse CV file.')).status).toBe(422);
    expect(toHttpError(new NetworkError('Could not fetch')).status).toBe(502);
  });

  it('treats anything else as an internal error', () => {
    expect(toHttpError(new Error('boom'))).toEqual({ status: 500, body: { error: 'boom' } });
    expect(toHttpError('plain string')).toEqual({ status: 500, body: { error: 'plain string' } });
  });
});
