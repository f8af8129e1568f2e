// Core types
export type { WorkerConfig, WorkerHandle, WorkItem, Outcome, WorkerError, WorkerErrorKind, ConnectResult, ExecuteResult } from './workers/handle.js';
export type { WorkerStatus } from './pool/status.js';
export type { HealthSummary, WorkerListing } from './pool/health.js';
export type { Lease, ReleaseOutcome, AddResult, AddError, InitializeResult, InitFailure, AccountPoolOptions } from './pool/account-pool.js';
export type { DispatchResult, WorkItemState, DispatcherOptions } from './scheduler/dispatcher.js';
export type { InboundMessage, IntakeResult, IntakeCounters, IntakeOptions } from './scheduler/intake.js';
export type { Analysis, Classifier, Language } from './classifier/analyzer.js';
export type { PoolStore, WorkerRecord, OutcomeRecord, OutcomeStatus, PoolEntryConfig, SenderListing, SenderStatus } from './store/store.js';
export type { ServiceStats, OutcomeSummary, SummaryOptions } from './analytics/service-stats.js';
export type { SwitchyardConfig, ServiceConfig, PoolConfig, DispatchConfig, ClassifierConfig, SendersConfig } from './config/schema.js';

// Classes
export { AccountPool } from './pool/account-pool.js';
export { Dispatcher } from './scheduler/dispatcher.js';
export { Intake } from './scheduler/intake.js';
export { KeywordClassifier } from './classifier/analyzer.js';
export { JsonPoolStore, StoreError } from './store/json-store.js';
export { HandleRegistry, UnknownBindingError, createDefaultRegistry } from './workers/registry.js';
export { HttpWorkerHandle, classifyApiError } from './workers/bindings/http.js';

// Helpers
export { rateLimited, authExpired, transient, clampCooldown, MAX_COOLDOWN_SECONDS } from './workers/handle.js';
export { summarizeOutcomes } from './analytics/service-stats.js';
export { isSelectable, isCoolingDown } from './pool/status.js';
export { summarizeHealth, projectStatus } from './pool/health.js';

// Config
export { loadConfig, resetConfigCache, getGlobalConfigDir, ConfigError } from './config/config.js';
export { DEFAULT_CONFIG } from './config/defaults.js';

// Utils
export { logger, setLogLevel } from './utils/logger.js';
