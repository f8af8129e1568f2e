import type { Analysis, Classifier } from '../classifier/analyzer.js';
import type { PoolStore, OutcomeRecord, SenderStatus } from '../store/store.js';
import type { SendersConfig } from '../config/schema.js';
import type { WorkItem } from '../workers/handle.js';
import type { DispatchResult, Dispatcher } from './dispatcher.js';
import { generateWorkItemId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

const log = logger.child('intake');

export interface InboundMessage {
  text: string;
  chatId?: string;
  messageId?: string;
  /** Author of the message, checked against the sender listings */
  senderId?: string;
}

export interface IntakeResult {
  workItemId: string;
  /** Null when the sender was screened out before classification */
  analysis: Analysis | null;
  /** Undefined when the message was not dispatched */
  dispatch?: DispatchResult;
}

export interface IntakeCounters {
  received: number;
  blocked: number;
  matched: number;
  dispatched: number;
  failed: number;
  noCapacity: number;
}

export interface IntakeOptions {
  threshold: number;
  /** Outcome log and sender listings */
  store?: PoolStore;
  senders?: SendersConfig;
}

const DEFAULT_SENDERS: SendersConfig = { blocklistEnabled: true, allowlistOnly: false };

/** Classifies inbound messages and dispatches the ones that read as work */
export class Intake {
  private counters: IntakeCounters = { received: 0, blocked: 0, matched: 0, dispatched: 0, failed: 0, noCapacity: 0 };

  constructor(
    private classifier: Classifier,
    private dispatcher: Dispatcher,
    private options: IntakeOptions,
  ) {}

  async handle(message: InboundMessage): Promise<IntakeResult> {
    this.counters.received++;
    const workItemId = generateWorkItemId();

    const refusal = await this.screenSender(message.senderId);
    if (refusal) {
      this.counters.blocked++;
      log.info('Sender screened out', { item: workItemId, sender: message.senderId, reason: refusal });
      await this.record({
        workItemId,
        status: 'blocked',
        attempts: 0,
        score: 0,
        tags: [],
        sourceChatId: message.chatId,
        sourceMessageId: message.messageId,
        senderId: message.senderId,
        error: refusal,
        recordedAt: new Date().toISOString(),
      });
      return { workItemId, analysis: null };
    }

    const analysis = this.classifier.analyze(message.text);

    if (!analysis.isWork || analysis.score < this.options.threshold) {
      await this.record({
        workItemId,
        status: 'ignored',
        attempts: 0,
        score: analysis.score,
        tags: analysis.tags,
        sourceChatId: message.chatId,
        sourceMessageId: message.messageId,
        senderId: message.senderId,
        recordedAt: new Date().toISOString(),
      });
      return { workItemId, analysis };
    }

    this.counters.matched++;
    log.info('Work detected', { item: workItemId, score: analysis.score, tags: analysis.tags.join(',') });

    const item: WorkItem = {
      id: workItemId,
      text: message.text,
      sourceChatId: message.chatId,
      sourceMessageId: message.messageId,
      tags: analysis.tags,
      score: analysis.score,
      receivedAt: new Date().toISOString(),
    };
    const dispatch = await this.dispatcher.dispatch(item);

    const record: OutcomeRecord = {
      workItemId,
      status: dispatch.status,
      attempts: dispatch.attempts,
      score: analysis.score,
      tags: analysis.tags,
      sourceChatId: message.chatId,
      sourceMessageId: message.messageId,
      senderId: message.senderId,
      recordedAt: new Date().toISOString(),
    };
    switch (dispatch.status) {
      case 'succeeded':
        this.counters.dispatched++;
        record.workerId = dispatch.workerId;
        break;
      case 'failed':
        this.counters.failed++;
        record.workerId = dispatch.workerId;
        record.error = dispatch.error.message;
        break;
      case 'no-capacity':
        this.counters.noCapacity++;
        break;
    }
    await this.record(record);

    return { workItemId, analysis, dispatch };
  }

  getCounters(): IntakeCounters {
    return { ...this.counters };
  }

  /** Reason to refuse the sender, or null to let the message through */
  private async screenSender(senderId: string | undefined): Promise<string | null> {
    const { store } = this.options;
    const senders = this.options.senders ?? DEFAULT_SENDERS;
    if (!store || (!senders.blocklistEnabled && !senders.allowlistOnly)) return null;
    if (!senderId) {
      return senders.allowlistOnly ? 'Sender unknown' : null;
    }

    let status: SenderStatus | undefined;
    try {
      status = (await store.getSenderListing(senderId))?.status;
    } catch (err) {
      log.warn(`Failed to look up sender ${senderId}: ${err}`);
      return senders.allowlistOnly ? 'Sender lookup failed' : null;
    }

    if (senders.blocklistEnabled && status === 'blocked') return 'Sender blocked';
    if (senders.allowlistOnly && status !== 'allowed') return 'Sender not allowed';
    return null;
  }

  private async record(outcome: OutcomeRecord): Promise<void> {
    if (!this.options.store) return;
    try {
      await this.options.store.recordOutcome(outcome);
    } catch (err) {
      log.warn(`Failed to record outcome for ${outcome.workItemId}: ${err}`);
    }
  }
}
