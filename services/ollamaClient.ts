import fetch from 'node-fetch';
import { z } from 'zod';
import type { ModelConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import type { ModelFactory, ModelHandle, ModelRegistry } from './modelResolver';

const log = createLogger('Ollama');

const REACHABILITY_TIMEOUT_MS = 5_000;

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string().min(1) }).passthrough()),
});

export interface OllamaRegistryOptions {
  baseUrl: string;
  /** Timeout for the listing request, in seconds */
  timeout: number;
  reachabilityTimeoutMs?: number;
}

/**
 * Reports which models the Ollama server has installed and whether it answers at all.
 * Neither call throws: an unreachable server or a malformed listing reads as "nothing installed".
 */
export class OllamaRegistry implements ModelRegistry {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaRegistryOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  get url(): string {
    return this.baseUrl;
  }

  async isReachable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.options.reachabilityTimeoutMs ?? REACHABILITY_TIMEOUT_MS),
      });
      // Drained so the keep-alive socket goes back to the agent.
      await res.arrayBuffer();
      return res.ok;
    } catch (error) {
      log.debug({ err: errorMessage(error) }, 'Ollama availability check failed');
      return false;
    }
  }

  async listInstalledModels(): Promise<string[]> {
    if (!(await this.isReachable())) return [];

    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(this.options.timeout * 1000),
      });
      if (!res.ok) {
        log.warn({ status: res.status }, 'Model listing request failed');
        return [];
      }
      const parsed = tagsResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues.length }, 'Unexpected model listing response');
        return [];
      }
      const models = parsed.data.models.map((model) => model.name);
      log.debug({ models }, 'Installed models');
      return models;
    } catch (error) {
      log.warn({ err: errorMessage(error) }, 'Failed to get installed models');
      return [];
    }
  }
}

/** What a generation endpoint can hand back, before it is reduced to text. */
export type GenerationPayload =
  | { kind: 'message'; content: string }
  | { kind: 'completion'; response: string }
  | { kind: 'text'; text: string };

const chatResponseSchema = z.object({ message: z.object({ content: z.string() }) });
const completionResponseSchema = z.object({ response: z.string() });

export function toGenerationPayload(body: unknown): GenerationPayload {
  if (typeof body === 'string') return { kind: 'text', text: body };

  const chat = chatResponseSchema.safeParse(body);
  if (chat.success) return { kind: 'message', content: chat.data.message.content };

  const completion = completionResponseSchema.safeParse(body);
  if (completion.success) return { kind: 'completion', response: completion.data.response };

  throw new Error('Unrecognized generation response');
}

export function payloadText(payload: GenerationPayload): string {
  switch (payload.kind) {
    case 'message':
      return payload.content;
    case 'completion':
      return payload.response;
    case 'text':
      return payload.text;
  }
}

/** A chat client bound to one Ollama model. */
export class OllamaChatModel implements ModelHandle {
  constructor(
    readonly config: ModelConfig,
    private readonly baseUrl: string,
  ) {}

  get name(): string {
    return this.config.name;
  }

  async invoke(prompt: string): Promise<string> {
    const res = await fetch(`${this.baseUrl.replace(/\/+$/, '')}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.config.name,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        options: {
          temperature: this.config.temperature,
          ...(this.config.maxTokens !== undefined && { num_predict: this.config.maxTokens }),
        },
      }),
      signal: AbortSignal.timeout(this.config.timeout * 1000),
    });

    if (!res.ok) {
      const detail = await res.text();
      throw new Error(`Ollama chat failed for ${this.config.name} (${res.status}): ${detail}`);
    }

    return payloadText(toGenerationPayload(await res.json()));
  }
}

export function ollamaModelFactory(baseUrl: string): ModelFactory {
  return (config) => new OllamaChatModel(config, baseUrl);
}
