// ============================================================
// Vision Analyzer - Constants
// ============================================================

import type { AnalysisType, MediaType, ProviderId } from './types';

/** Provider selectors in display order */
export const PROVIDER_IDS: readonly ProviderId[] = ['gpt4o', 'claude', 'gemini'];

/** Analysis types in display order */
export const ANALYSIS_TYPES: readonly AnalysisType[] = [
  'detailed',
  'story',
  'technical',
  'creative',
];

export const DEFAULT_PROVIDER: ProviderId = 'gpt4o';
export const DEFAULT_ANALYSIS_TYPE: AnalysisType = 'detailed';

/** Fixed request settings per provider */
export const OPENAI_DEFAULTS = {
  MODEL: 'gpt-4o',
  MAX_TOKENS: 2000,
  TEMPERATURE: 0.7,
  IMAGE_DETAIL: 'high',
} as const;

export const ANTHROPIC_DEFAULTS = {
  MODEL: 'claude-sonnet-4-5-20250929',
  MAX_TOKENS: 2000,
} as const;

export const GEMINI_DEFAULTS = {
  MODEL: 'gemini-2.5-flash',
} as const;

/** Environment variable holding each provider's API key */
export const CREDENTIAL_ENV_VARS = {
  gpt4o: 'OPENAI_API_KEY',
  claude: 'ANTHROPIC_API_KEY',
  gemini: 'GOOGLE_API_KEY',
} as const satisfies Record<ProviderId, string>;

/** Extension (lowercase, with dot) to MIME type */
export const MEDIA_TYPES: Readonly<Record<string, MediaType>> = Object.freeze({
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
});

export const DEFAULT_MEDIA_TYPE: MediaType = 'image/jpeg';

/** Upload limits for the HTTP server */
export const UPLOAD = {
  ALLOWED_EXTENSIONS: new Set(['png', 'jpg', 'jpeg', 'gif', 'webp']),
  MAX_FILE_SIZE_BYTES: 16 * 1024 * 1024,
} as const;

export const SERVER_DEFAULTS = {
  PORT: 5000,
  VERSION: '0.1.0',
} as const;
