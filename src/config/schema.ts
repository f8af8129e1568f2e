import { z } from 'zod';

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const patternSchema = z.string().refine(compiles, pattern => ({ message: `Invalid regular expression: ${pattern}` }));

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const serviceConfigSchema = z.object({
  /** Base URL of the Bot-API style messaging service */
  apiBase: z.string().url(),
  /** Chat that accepted work items are delivered to */
  targetChatId: z.string(),
  /** Per-request timeout for the http binding */
  requestTimeoutMs: z.number().int().positive(),
});

export const poolConfigSchema = z.object({
  /** Upper bound on one reconnect round-trip during selection */
  reconnectTimeoutMs: z.number().int().positive(),
  /** Default capacity of a worker that does not set its own */
  maxConcurrentPerWorker: z.number().int().positive(),
});

export const dispatchConfigSchema = z.object({
  /** Total execute attempts per work item, first try included */
  maxAttempts: z.number().int().min(1),
});

export const classifierConfigSchema = z.object({
  /** Minimum score (0..100) for a message to be dispatched */
  threshold: z.number().min(0).max(100),
  minLength: z.number().int().min(0),
  maxLength: z.number().int().positive(),
  /** Service tag -> keywords that indicate it */
  services: z.record(z.array(z.string())),
  /** Regular expressions (case-insensitive) that read as a request */
  requestPatterns: z.array(patternSchema),
  negativeIndicators: z.array(z.string()),
  /** Urgency level (2..5) -> keywords */
  urgencyKeywords: z.record(z.array(z.string())),
});

export const sendersConfigSchema = z.object({
  /** Drop messages from blocked senders */
  blocklistEnabled: z.boolean(),
  /** Only accept messages from allowed senders */
  allowlistOnly: z.boolean(),
});

export const configSchema = z.object({
  logLevel: logLevelSchema,
  jsonOutput: z.boolean(),
  /** Directory holding accounts.json and outcomes.json; '' resolves to ~/.switchyard */
  storeDir: z.string(),
  service: serviceConfigSchema,
  pool: poolConfigSchema,
  dispatch: dispatchConfigSchema,
  classifier: classifierConfigSchema,
  senders: sendersConfigSchema,
});

export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
export type PoolConfig = z.infer<typeof poolConfigSchema>;
export type DispatchConfig = z.infer<typeof dispatchConfigSchema>;
export type ClassifierConfig = z.infer<typeof classifierConfigSchema>;
export type SendersConfig = z.infer<typeof sendersConfigSchema>;
export type SwitchyardConfig = z.infer<typeof configSchema>;
