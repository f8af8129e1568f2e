import { z } from 'zod';
import type { ConnectResult, ExecuteResult, WorkItem, WorkerConfig, WorkerError, WorkerHandle } from '../handle.js';
import { authExpired, rateLimited, toTransient, transient } from '../handle.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('http');

/** Cooldown applied when a 429 carries no retry_after */
export const DEFAULT_RETRY_AFTER_SECONDS = 30;

const apiReplySchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).passthrough().optional(),
});

const sentMessageSchema = z.object({ message_id: z.union([z.number(), z.string()]) }).passthrough();

export type ApiReply = z.infer<typeof apiReplySchema>;

export interface HttpHandleOptions {
  apiBase: string;
  targetChatId: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

/** Maps a failed Bot-API reply onto the worker error taxonomy */
export function classifyApiError(httpStatus: number, reply: ApiReply | null): WorkerError {
  const code = reply?.error_code ?? httpStatus;
  const description = reply?.description ?? `HTTP ${httpStatus}`;

  if (code === 429) {
    // rateLimited() caps the cooldown at MAX_COOLDOWN_SECONDS
    const retryAfter = reply?.parameters?.retry_after ?? DEFAULT_RETRY_AFTER_SECONDS;
    return rateLimited(retryAfter, description);
  }
  if (code === 401 || code === 403) {
    return authExpired(description);
  }
  return transient(description);
}

/**
 * Handle for a Bot-API style HTTP messaging service. The service is
 * stateless, so "connected" means the token passed getMe and has not been
 * rejected since.
 */
export class HttpWorkerHandle implements WorkerHandle {
  private connected = false;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: WorkerConfig,
    private readonly options: HttpHandleOptions,
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get id(): string {
    return this.config.id;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<ConnectResult> {
    const reply = await this.call('getMe');
    if (!reply.ok) {
      this.connected = false;
      return reply;
    }
    this.connected = true;
    log.debug(`Worker ${this.id} authorized`);
    return { ok: true };
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async execute(work: WorkItem): Promise<ExecuteResult> {
    if (!this.connected) {
      return { ok: false, error: transient('Not connected') };
    }

    const reply = await this.call('sendMessage', {
      chat_id: this.options.targetChatId,
      text: work.text,
    });
    if (!reply.ok) {
      if (reply.error.kind === 'auth-expired') {
        this.connected = false;
      }
      return reply;
    }

    const sent = sentMessageSchema.safeParse(reply.result);
    return {
      ok: true,
      outcome: {
        deliveredAt: new Date().toISOString(),
        remoteId: sent.success ? String(sent.data.message_id) : undefined,
      },
    };
  }

  private async call(
    method: string,
    body?: Record<string, unknown>,
  ): Promise<{ ok: true; result: unknown } | { ok: false; error: WorkerError }> {
    const url = `${this.options.apiBase.replace(/\/+$/, '')}/bot${this.config.credentials.token}/${method}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: body ? 'POST' : 'GET',
        headers: body ? { 'content-type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (err) {
      return { ok: false, error: toTransient(err) };
    }

    let reply: ApiReply | null = null;
    try {
      const parsed = apiReplySchema.safeParse(await response.json());
      if (parsed.success) reply = parsed.data;
    } catch {
      reply = null;
    }

    if (response.ok && reply?.ok) {
      return { ok: true, result: reply.result };
    }
    return { ok: false, error: classifyApiError(response.status, reply) };
  }
}
