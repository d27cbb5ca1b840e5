// ============================================================
// Vision Analyzer - Shared Type Definitions
// Core types used across the library, the CLI, and the server
// ============================================================

/** Identifier of a supported vision model backend */
export type ProviderId = 'gpt4o' | 'claude' | 'gemini';

/** Built-in prompt template selector */
export type AnalysisType = 'detailed' | 'story' | 'technical' | 'creative';

/** Image encodings the providers accept */
export type MediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

/** A single analysis call, built once and used once */
export interface AnalysisRequest {
  /** Raw image bytes */
  readonly image: Buffer;
  readonly mediaType: MediaType;
  /** Provider selector, unvalidated; the dispatcher rejects anything not a ProviderId */
  readonly provider: string;
  /** Analysis type tag, unvalidated; anything not an AnalysisType selects the detailed template */
  readonly analysisType?: string;
  /** Overrides the analysis type when non-empty */
  readonly customPrompt?: string;
}

export interface AnalysisSuccess {
  success: true;
  analysis: string;
}

export interface AnalysisFailure {
  success: false;
  error: string;
}

/** Normalized outcome of a provider call. Failures are values, never thrown. */
export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

/** Results of running one image through every available provider */
export type ComparisonResults = Partial<Record<ProviderId, AnalysisResult>>;

/** API keys, one per provider; any may be absent */
export interface ProviderCredentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
  googleApiKey?: string;
}

/** Provider entry as listed by GET /api/models */
export interface ProviderInfo {
  id: ProviderId;
  name: string;
  model: string;
  available: boolean;
}
