import type { OutcomeRecord, OutcomeStatus } from '../store/store.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ServiceStats {
  tag: string;
  total: number;
  /** Items a worker delivered */
  delivered: number;
  /** Mean of the non-zero scores, two decimals */
  averageScore: number;
  /** Up to three UTC hours with the most items, busiest first */
  peakHours: number[];
}

export interface OutcomeSummary {
  total: number;
  byStatus: Record<OutcomeStatus, number>;
  /** Items per minute over the rate window */
  perMinute: number;
  /** Busiest service first */
  services: ServiceStats[];
}

export interface SummaryOptions {
  /** Clock in epoch ms */
  now?: number;
  /** Outcomes older than this are left out (default 30) */
  windowDays?: number;
  /** Window for perMinute (default 5) */
  rateWindowMinutes?: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function peakHours(hours: Map<number, number>): number[] {
  return Array.from(hours.entries())
    .sort(([hourA, countA], [hourB, countB]) => countB - countA || hourA - hourB)
    .slice(0, 3)
    .map(([hour]) => hour);
}

interface ServiceTally {
  total: number;
  delivered: number;
  scores: number[];
  hours: Map<number, number>;
}

/** Roll-up of the outcome log per service tag */
export function summarizeOutcomes(records: readonly OutcomeRecord[], options: SummaryOptions = {}): OutcomeSummary {
  const now = options.now ?? Date.now();
  const cutoff = now - (options.windowDays ?? 30) * DAY_MS;
  const rateMinutes = options.rateWindowMinutes ?? 5;
  const rateCutoff = now - rateMinutes * MINUTE_MS;

  const byStatus: Record<OutcomeStatus, number> = {
    succeeded: 0,
    failed: 0,
    'no-capacity': 0,
    ignored: 0,
    blocked: 0,
  };
  const tallies = new Map<string, ServiceTally>();
  let total = 0;
  let recent = 0;

  for (const record of records) {
    const at = Date.parse(record.recordedAt);
    if (Number.isNaN(at) || at <= cutoff) continue;

    total++;
    byStatus[record.status]++;
    if (at > rateCutoff) recent++;

    const hour = new Date(at).getUTCHours();
    for (const tag of record.tags) {
      let tally = tallies.get(tag);
      if (!tally) {
        tally = { total: 0, delivered: 0, scores: [], hours: new Map() };
        tallies.set(tag, tally);
      }
      tally.total++;
      if (record.status === 'succeeded') tally.delivered++;
      if (record.score > 0) tally.scores.push(record.score);
      tally.hours.set(hour, (tally.hours.get(hour) ?? 0) + 1);
    }
  }

  const services = Array.from(tallies, ([tag, t]): ServiceStats => ({
    tag,
    total: t.total,
    delivered: t.delivered,
    averageScore: t.scores.length > 0 ? round2(t.scores.reduce((a, b) => a + b, 0) / t.scores.length) : 0,
    peakHours: peakHours(t.hours),
  })).sort((a, b) => b.total - a.total || a.tag.localeCompare(b.tag));

  return {
    total,
    byStatus,
    perMinute: rateMinutes > 0 ? round2(recent / rateMinutes) : 0,
    services,
  };
}
