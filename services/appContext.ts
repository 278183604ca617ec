import { fallbackModelConfigs, primaryModelConfig, type Settings } from './config';
import { setLogLevel } from './logger';
import { ModelResolver, type ModelRegistry } from './modelResolver';
import { OllamaRegistry, ollamaModelFactory } from './ollamaClient';

/** Everything built once per process and passed to the CLI, the server and the agents. */
export interface AppContext {
  settings: Settings;
  registry: ModelRegistry;
  resolver: ModelResolver;
}

export function createAppContext(settings: Settings): AppContext {
  setLogLevel(settings.logLevel);

  const registry = new OllamaRegistry({
    baseUrl: settings.ollamaBaseUrl,
    timeout: settings.ollamaTimeout,
  });

  const resolver = new ModelResolver({
    registry,
    createModel: ollamaModelFactory(settings.ollamaBaseUrl),
    primary: primaryModelConfig(settings),
    fallbacks: fallbackModelConfigs(settings),
  });

  return { settings, registry, resolver };
}

export interface SystemStatus {
  appName: string;
  appVersion: string;
  debugMode: boolean;
  ollamaUrl: string;
  primaryModel: string;
  fallbackModels: string[];
}

export function getSystemStatus(settings: Settings): SystemStatus {
  return {
    appName: settings.appName,
    appVersion: settings.appVersion,
    debugMode: settings.debug,
    ollamaUrl: settings.ollamaBaseUrl,
    primaryModel: settings.primaryModelName,
    fallbackModels: [...settings.fallbackModelNames],
  };
}
