import type { ModelConfig } from './config';
import {
  fail,
  noModelsAvailable,
  noWorkingModel,
  ok,
  serviceUnavailable,
  errorMessage,
  type ModelError,
  type Result,
} from './errors';
import { createLogger } from './logger';

const log = createLogger('ModelResolver');

export const LIVENESS_PROMPT = "Respond with exactly 'OK' if you understand this message.";
const LIVENESS_TOKEN = 'ok';

/** A configured client bound to one named model. */
export interface ModelHandle {
  readonly name: string;
  readonly config: ModelConfig;
  invoke(prompt: string): Promise<string>;
}

/** Reports what the serving endpoint has installed. Implementations never throw. */
export interface ModelRegistry {
  readonly url: string;
  isReachable(): Promise<boolean>;
  listInstalledModels(): Promise<string[]>;
}

export type ModelFactory = (config: ModelConfig) => ModelHandle;

/** What agents depend on: something that hands out a working model. */
export interface HandleSource {
  getHandle(): Result<ModelHandle>;
}

export type ResolverPhase = 'uninitialized' | 'initializing' | 'ready' | 'failed';

export interface HealthSummary {
  models: Record<string, boolean>;
  healthyCount: number;
  totalCount: number;
  endpointReachable: boolean;
}

export interface ModelStatus {
  initialized: boolean;
  reachable: boolean;
  installedModels: string[];
  modelHealth: Record<string, boolean>;
  primaryModel: string;
  fallbackModels: string[];
  hasWorkingModel: boolean;
  /** The model getHandle would hand out right now; absent until the resolver is ready. */
  activeModel?: string;
}

export interface ModelResolverOptions {
  registry: ModelRegistry;
  createModel: ModelFactory;
  primary: ModelConfig;
  fallbacks: ModelConfig[];
}

/**
 * Picks a working model out of a primary and an ordered fallback list.
 *
 * `initialize()` probes every installed candidate once, sequentially, and records the result
 * in the health map. `getHandle()` only reads that map; `healthCheck()` is the only way to
 * refresh it. A handle is handed out only while its last probe passed.
 *
 * A failed initialization is not retried. When it failed because every probe failed, a later
 * `healthCheck()` that sees a model pass moves the resolver to ready.
 */
export class ModelResolver implements HandleSource {
  private phase: ResolverPhase = 'uninitialized';
  private primaryHandle: ModelHandle | undefined;
  private fallbackHandles: ModelHandle[] = [];
  private readonly health = new Map<string, boolean>();
  private installed: string[] = [];
  private reachable = false;
  private pending: Promise<Result<void>> | undefined;
  private failure: ModelError | undefined;

  private readonly registry: ModelRegistry;
  private readonly createModel: ModelFactory;
  private readonly primary: ModelConfig;
  private readonly fallbacks: ModelConfig[];

  constructor(options: ModelResolverOptions) {
    this.registry = options.registry;
    this.createModel = options.createModel;
    this.primary = options.primary;

    const seen = new Set([options.primary.name]);
    this.fallbacks = options.fallbacks.filter((config) => {
      if (seen.has(config.name)) {
        log.debug({ model: config.name }, 'Ignoring duplicate fallback model');
        return false;
      }
      seen.add(config.name);
      return true;
    });
  }

  get state(): ResolverPhase {
    return this.phase;
  }

  initialize(): Promise<Result<void>> {
    if (this.phase === 'ready') return Promise.resolve(ok(undefined));
    if (this.phase === 'failed' && this.failure) return Promise.resolve(fail(this.failure));
    if (!this.pending) {
      this.pending = this.runInitialize().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async runInitialize(): Promise<Result<void>> {
    this.phase = 'initializing';
    log.info('Initializing model resolver...');

    this.reachable = await this.registry.isReachable();
    if (!this.reachable) {
      return this.failWith(serviceUnavailable(this.registry.url));
    }

    this.installed = await this.registry.listInstalledModels();
    log.info({ models: this.installed }, 'Installed models');
    if (this.installed.length === 0) {
      return this.failWith(noModelsAvailable());
    }

    if (this.installed.includes(this.primary.name)) {
      this.primaryHandle = await this.tryCreate(this.primary);
      if (!this.health.get(this.primary.name)) {
        log.warn({ model: this.primary.name }, 'Primary model failed to initialize');
      }
    } else {
      log.warn({ model: this.primary.name }, 'Primary model not installed');
    }

    for (const config of this.fallbacks) {
      if (!this.installed.includes(config.name)) {
        log.warn({ model: config.name }, 'Fallback model not installed');
        continue;
      }
      const handle = await this.tryCreate(config);
      if (handle) this.fallbackHandles.push(handle);
    }

    const working = this.fallbackHandles.filter((handle) => this.health.get(handle.name)).length;
    log.info({ working }, 'Initialized fallback models');

    if (!this.hasWorkingModel()) {
      return this.failWith(noWorkingModel());
    }

    this.phase = 'ready';
    log.info('Model resolver initialization complete');
    return ok(undefined);
  }

  private failWith(error: ModelError): Result<void> {
    this.phase = 'failed';
    this.failure = error;
    log.error({ kind: error.kind }, error.message);
    return fail(error);
  }

  /** Construct and probe. The handle is kept even when the probe fails so healthCheck can retry it. */
  private async tryCreate(config: ModelConfig): Promise<ModelHandle | undefined> {
    let handle: ModelHandle;
    try {
      handle = this.createModel(config);
    } catch (error) {
      log.error({ model: config.name, err: errorMessage(error) }, 'Failed to create model client');
      this.health.set(config.name, false);
      return undefined;
    }

    const passed = await this.probe(handle);
    this.health.set(config.name, passed);
    if (passed) log.info({ model: config.name }, 'Model passed liveness probe');
    return handle;
  }

  private async probe(handle: ModelHandle): Promise<boolean> {
    try {
      const text = await handle.invoke(LIVENESS_PROMPT);
      const passed = text.toLowerCase().includes(LIVENESS_TOKEN);
      if (!passed) {
        log.warn({ model: handle.name, response: text.slice(0, 200) }, 'Unexpected liveness response');
      }
      return passed;
    } catch (error) {
      log.warn({ model: handle.name, err: errorMessage(error) }, 'Model failed liveness probe');
      return false;
    }
  }

  getHandle(): Result<ModelHandle> {
    if (this.phase !== 'ready') {
      return fail(noWorkingModel('Model resolver not initialized. Call initialize() first.'));
    }

    const handle = this.selectHandle();
    if (!handle) {
      return fail(noWorkingModel('No working LLM model available: all configured models failed their last health check'));
    }
    if (handle === this.primaryHandle) log.debug({ model: handle.name }, 'Using primary model');
    else log.info({ model: handle.name }, 'Using fallback model');
    return ok(handle);
  }

  /** Primary while healthy, else the first healthy fallback in configured order. */
  private selectHandle(): ModelHandle | undefined {
    if (this.primaryHandle && this.health.get(this.primaryHandle.name) === true) {
      return this.primaryHandle;
    }
    return this.fallbackHandles.find((handle) => this.health.get(handle.name) === true);
  }

  async healthCheck(): Promise<HealthSummary> {
    const models: Record<string, boolean> = {};
    const handles = this.primaryHandle ? [this.primaryHandle, ...this.fallbackHandles] : this.fallbackHandles;

    for (const handle of handles) {
      const passed = await this.probe(handle);
      this.health.set(handle.name, passed);
      models[handle.name] = passed;
    }

    this.reachable = await this.registry.isReachable();

    if (this.phase === 'failed' && this.failure?.kind === 'NoWorkingModel' && this.hasWorkingModel()) {
      this.phase = 'ready';
      this.failure = undefined;
      log.info('A model passed its health check; model resolver is ready');
    }

    const values = Object.values(models);
    return {
      models,
      healthyCount: values.filter(Boolean).length,
      totalCount: values.length,
      endpointReachable: this.reachable,
    };
  }

  /** Snapshot of the last recorded state; makes no network calls. */
  getModelStatus(): ModelStatus {
    return {
      initialized: this.phase === 'ready',
      reachable: this.reachable,
      installedModels: [...this.installed],
      modelHealth: Object.fromEntries(this.health),
      primaryModel: this.primary.name,
      fallbackModels: this.fallbacks.map((config) => config.name),
      hasWorkingModel: this.hasWorkingModel(),
      activeModel: this.phase === 'ready' ? this.selectHandle()?.name : undefined,
    };
  }

  private hasWorkingModel(): boolean {
    return [...this.health.values()].some(Boolean);
  }
}
