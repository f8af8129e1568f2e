import type { SwitchyardConfig } from '../config/schema.js';
import { loadConfig } from '../config/config.js';
import { JsonPoolStore } from '../store/json-store.js';
import { createDefaultRegistry } from '../workers/registry.js';
import type { HandleRegistry } from '../workers/registry.js';
import { AccountPool } from '../pool/account-pool.js';
import { Dispatcher } from '../scheduler/dispatcher.js';
import { Intake } from '../scheduler/intake.js';
import { KeywordClassifier } from '../classifier/analyzer.js';
import { setLogLevel } from '../utils/logger.js';
import { setJsonOutput } from './output.js';

export interface AppContext {
  config: SwitchyardConfig;
  store: JsonPoolStore;
  registry: HandleRegistry;
  pool: AccountPool;
  dispatcher: Dispatcher;
  classifier: KeywordClassifier;
  intake: Intake;
}

let cachedContext: AppContext | null = null;

export function buildContext(config: SwitchyardConfig, registry?: HandleRegistry): AppContext {
  const store = new JsonPoolStore(config.storeDir);
  const handles = registry ?? createDefaultRegistry(config.service);
  const pool = new AccountPool(handles, {
    reconnectTimeoutMs: config.pool.reconnectTimeoutMs,
    maxConcurrentPerWorker: config.pool.maxConcurrentPerWorker,
    store,
  });
  const dispatcher = new Dispatcher(pool, { maxAttempts: config.dispatch.maxAttempts });
  const classifier = new KeywordClassifier(config.classifier);
  const intake = new Intake(classifier, dispatcher, {
    threshold: config.classifier.threshold,
    store,
    senders: config.senders,
  });

  return { config, store, registry: handles, pool, dispatcher, classifier, intake };
}

/** Log level and output mode from config; a --json flag already set stays on */
export function applyRuntimeConfig(config: SwitchyardConfig): void {
  setLogLevel(config.logLevel);
  if (config.jsonOutput) {
    setJsonOutput(true);
  }
}

export async function getContext(): Promise<AppContext> {
  if (cachedContext) return cachedContext;

  const config = await loadConfig();
  applyRuntimeConfig(config);

  cachedContext = buildContext(config);
  return cachedContext;
}
