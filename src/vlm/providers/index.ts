import type { ProviderCredentials, ProviderId } from '@shared/types';
import { AnthropicVisionProvider } from './anthropic';
import { GeminiVisionProvider } from './gemini';
import { OpenAIVisionProvider } from './openai';
import type { VisionProvider } from './types';

export type { VisionProvider } from './types';
export { OpenAIVisionProvider } from './openai';
export { AnthropicVisionProvider } from './anthropic';
export { GeminiVisionProvider } from './gemini';

/**
 * Builds one adapter per provider ID, each holding its own credential.
 */
export function createProviders(
  credentials: ProviderCredentials,
): Record<ProviderId, VisionProvider> {
  return {
    gpt4o: new OpenAIVisionProvider(credentials.openaiApiKey),
    claude: new AnthropicVisionProvider(credentials.anthropicApiKey),
    gemini: new GeminiVisionProvider(credentials.googleApiKey),
  };
}
