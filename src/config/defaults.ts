import type { SwitchyardConfig } from './schema.js';

export const DEFAULT_CONFIG: SwitchyardConfig = {
  logLevel: 'info',
  jsonOutput: false,
  storeDir: '',  // resolved at runtime to ~/.switchyard
  service: {
    apiBase: 'https://api.telegram.org',
    targetChatId: '',
    requestTimeoutMs: 10_000,
  },
  pool: {
    reconnectTimeoutMs: 5_000,
    maxConcurrentPerWorker: 1,
  },
  dispatch: {
    maxAttempts: 2,
  },
  classifier: {
    threshold: 70,
    minLength: 10,
    maxLength: 10_000,
    services: {
      explanation: ['explain', 'explanation', 'walk me through'],
      reports: ['report', 'summary', 'summarize'],
      assignments: ['assignment', 'homework', 'research', 'project'],
      presentations: ['presentation', 'slides', 'powerpoint'],
      design: ['design', 'logo', 'banner', 'poster'],
      'mind-maps': ['mind map', 'mindmap'],
      thesis: ['thesis', 'dissertation'],
    },
    requestPatterns: [
      'need help',
      'help me',
      'anyone can',
      'can anyone',
      'looking for',
      'does anyone',
      'i need',
      'i want',
    ],
    negativeIndicators: ['thanks', 'thank you', 'done', 'finished', 'completed', 'resolved'],
    urgencyKeywords: {
      '5': ['urgent', 'emergency', 'asap'],
      '4': ['today', 'tonight'],
      '3': ['soon', 'quickly'],
      '2': ['tomorrow', 'next week'],
    },
  },
  senders: {
    blocklistEnabled: true,
    allowlistOnly: false,
  },
};
