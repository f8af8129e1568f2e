import type { ClassifierConfig } from '../config/schema.js';

export type Language = 'en' | 'ar' | 'mixed' | 'unknown';

export interface Analysis {
  isWork: boolean;
  /** 0..100 */
  score: number;
  /** Matched service tags, most matched first */
  tags: string[];
  /** 1..5 */
  urgency: number;
  language: Language;
}

export interface Classifier {
  analyze(text: string): Analysis;
}

const NOT_WORK: Omit<Analysis, 'language'> = { isWork: false, score: 0, tags: [], urgency: 1 };

export function detectLanguage(text: string): Language {
  const arabic = (text.match(/[\u0600-\u06FF]/g) ?? []).length;
  const latin = (text.match(/[a-zA-Z]/g) ?? []).length;
  const total = arabic + latin;
  if (total === 0) return 'unknown';

  const ratio = arabic / total;
  if (ratio > 0.7) return 'ar';
  if (ratio < 0.3) return 'en';
  return 'mixed';
}

/** 0..1: favours mid-length, readable, non-repetitive messages */
export function messageQuality(text: string): number {
  if (!text) return 0;

  const length = text.length;
  let lengthScore: number;
  if (length < 10) lengthScore = 0.3;
  else if (length <= 200) lengthScore = 1.0;
  else if (length <= 500) lengthScore = 0.8;
  else lengthScore = 0.5;

  const sentences = text.split(/[.!?\u060C\u061B\u061F]+/).map(s => s.trim()).filter(s => s.length > 0);
  const avgWords = sentences.length > 0
    ? sentences.reduce((sum, s) => sum + s.split(/\s+/).length, 0) / sentences.length
    : 0;
  const clarityScore = avgWords >= 5 && avgWords <= 20 ? 1.0 : 0.7;

  const words = text.toLowerCase().split(/\s+/).filter(w => w.length > 0);
  const repetition = words.length > 0 ? new Set(words).size / words.length : 0;

  return lengthScore * 0.4 + clarityScore * 0.4 + repetition * 0.2;
}

/**
 * Keyword and pattern scoring. Decides whether an inbound message is a
 * request worth delivering.
 */
export class KeywordClassifier implements Classifier {
  private readonly patterns: RegExp[];
  private readonly urgency: Array<[number, string[]]>;

  constructor(private readonly config: ClassifierConfig) {
    this.patterns = config.requestPatterns.map(p => new RegExp(p, 'i'));
    this.urgency = Object.entries(config.urgencyKeywords)
      .map(([level, words]): [number, string[]] => [Number(level), words])
      .filter(([level]) => Number.isInteger(level) && level >= 1 && level <= 5);
  }

  analyze(text: string): Analysis {
    const trimmed = text.trim();
    const language = detectLanguage(trimmed);
    if (trimmed.length < this.config.minLength || trimmed.length > this.config.maxLength) {
      return { ...NOT_WORK, language };
    }

    const lower = trimmed.toLowerCase();
    const tags = this.matchServices(lower);
    const requestMatches = this.patterns.filter(p => p.test(trimmed)).length;
    const negatives = this.config.negativeIndicators.filter(n => lower.includes(n.toLowerCase())).length;

    return {
      isWork: tags.length > 0 || requestMatches > 0,
      score: this.score(trimmed, tags.length, requestMatches, negatives, language),
      tags,
      urgency: this.urgencyLevel(lower),
      language,
    };
  }

  private matchServices(lower: string): string[] {
    const matched: Array<{ tag: string; count: number }> = [];
    for (const [tag, keywords] of Object.entries(this.config.services)) {
      const count = keywords.filter(k => lower.includes(k.toLowerCase())).length;
      if (count > 0) matched.push({ tag, count });
    }
    return matched.sort((a, b) => b.count - a.count).map(m => m.tag);
  }

  private score(text: string, services: number, requests: number, negatives: number, language: Language): number {
    if (services === 0) return 0;

    const base = Math.min(services * 25, 75);
    const requestBoost = Math.min(requests * 15, 30);
    const languageBonus = language === 'en' || language === 'ar' ? 10 : 5;
    const penalty = negatives * 10;

    const raw = (base + requestBoost + languageBonus - penalty) * messageQuality(text);
    return Math.min(Math.max(Math.round(raw), 0), 100);
  }

  private urgencyLevel(lower: string): number {
    let level = 1;
    for (const [value, words] of this.urgency) {
      if (value > level && words.some(w => lower.includes(w.toLowerCase()))) {
        level = value;
      }
    }
    return level;
  }
}
