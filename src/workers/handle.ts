/** Credentials and wiring for one account */
export interface WorkerConfig {
  id: string;
  /** Name of the handle binding in the registry (default 'http') */
  binding?: string;
  credentials: { token: string };
  /** Opaque reference to a persisted session; stored with the account, not read by the http binding */
  sessionRef?: string;
  /** Display name */
  label?: string;
  /** Overrides pool.maxConcurrentPerWorker */
  maxConcurrent?: number;
}

/** One unit of external work: deliver an accepted message */
export interface WorkItem {
  id: string;
  text: string;
  sourceChatId?: string;
  sourceMessageId?: string;
  tags: string[];
  score: number;
  receivedAt: string;
}

export interface Outcome {
  deliveredAt: string;
  /** Id the remote service assigned to the delivered message, if any */
  remoteId?: string;
}

export type WorkerError =
  | { kind: 'rate-limited'; cooldownSeconds: number; message: string }
  | { kind: 'auth-expired'; message: string }
  | { kind: 'transient'; message: string };

export type WorkerErrorKind = WorkerError['kind'];

export type ConnectResult = { ok: true } | { ok: false; error: WorkerError };

export type ExecuteResult = { ok: true; outcome: Outcome } | { ok: false; error: WorkerError };

/**
 * A live connection to the messaging service on behalf of one account.
 * Implementations report failures as values; they do not throw for
 * service-side errors.
 */
export interface WorkerHandle {
  readonly id: string;

  /** Connect and verify authorization */
  connect(): Promise<ConnectResult>;

  disconnect(): Promise<void>;

  /** Must reflect connection loss caused by the last execute() */
  isConnected(): boolean;

  execute(work: WorkItem): Promise<ExecuteResult>;
}

/** Longest cooldown a worker is ever parked for */
export const MAX_COOLDOWN_SECONDS = 24 * 60 * 60;

/** Bounds a service-supplied cooldown to 0..MAX_COOLDOWN_SECONDS */
export function clampCooldown(seconds: number): number {
  if (Number.isNaN(seconds)) return 0;
  return Math.min(Math.max(seconds, 0), MAX_COOLDOWN_SECONDS);
}

export function rateLimited(cooldownSeconds: number, message?: string): WorkerError {
  const seconds = clampCooldown(cooldownSeconds);
  return {
    kind: 'rate-limited',
    cooldownSeconds: seconds,
    message: message ?? `Rate limited for ${seconds}s`,
  };
}

export function authExpired(message = 'Authorization lost'): WorkerError {
  return { kind: 'auth-expired', message };
}

export function transient(message: string): WorkerError {
  return { kind: 'transient', message };
}

/** Turns anything a binding threw into a transient error */
export function toTransient(err: unknown): WorkerError {
  return transient(err instanceof Error ? err.message : String(err));
}
