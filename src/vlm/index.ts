// ============================================================
// Vision Analyzer - VLM Module
// Public API surface for prompts, providers, and dispatch
// ============================================================

// ---- Prompt catalog ----
export { PROMPT_TEMPLATES, isAnalysisType, resolvePrompt } from './prompt';

// ---- Provider adapters ----
export {
  createProviders,
  OpenAIVisionProvider,
  AnthropicVisionProvider,
  GeminiVisionProvider,
} from './providers';
export type { VisionProvider } from './providers';

// ---- Dispatcher ----
export { VisionDispatcher, INVALID_PROVIDER_MESSAGE } from './dispatcher';
