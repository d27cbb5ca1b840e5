// ============================================================
// Vision Analyzer - Provider Dispatcher
// Routes a call to the selected adapter and normalizes the outcome
// ============================================================

import { PROVIDER_IDS } from '@shared/constants';
import type {
  AnalysisResult,
  ComparisonResults,
  MediaType,
  ProviderId,
  ProviderInfo,
} from '@shared/types';
import type { VisionProvider } from './providers/types';

export const INVALID_PROVIDER_MESSAGE = 'Invalid model selected';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Dispatches analysis calls across the registered vision providers.
 *
 * `analyze` never rejects: an unknown selector, a missing credential, and
 * any error thrown by the remote call all come back as a failure value.
 */
export class VisionDispatcher {
  private readonly providers: Map<string, VisionProvider>;

  constructor(providers: Record<ProviderId, VisionProvider>) {
    this.providers = new Map(PROVIDER_IDS.map((id): [string, VisionProvider] => [id, providers[id]]));
  }

  async analyze(
    provider: string,
    image: Buffer,
    mediaType: MediaType,
    prompt: string,
  ): Promise<AnalysisResult> {
    const adapter = this.providers.get(provider);
    if (!adapter) {
      console.warn(`[dispatch] Rejected unknown provider "${provider}"`);
      return { success: false, error: INVALID_PROVIDER_MESSAGE };
    }

    if (!adapter.isAvailable()) {
      console.warn(`[dispatch] ${adapter.displayName} is not configured`);
      return { success: false, error: adapter.missingCredentialMessage() };
    }

    console.log(
      `[dispatch] Provider=${adapter.id}, model=${adapter.model}, ` +
        `mediaType=${mediaType}, imageSize=${Math.round(image.byteLength / 1024)}KB`,
    );
    const startTime = Date.now();

    try {
      const analysis = await adapter.analyze(image, mediaType, prompt);
      console.log(`[dispatch] ${adapter.id} responded in ${Date.now() - startTime}ms`);
      return { success: true, analysis };
    } catch (err) {
      const message = describeError(err);
      console.warn(`[dispatch] ${adapter.id} failed after ${Date.now() - startTime}ms: ${message}`);
      return { success: false, error: message };
    }
  }

  /** Provider IDs whose credential is configured */
  availableProviders(): ProviderId[] {
    return PROVIDER_IDS.filter((id) => this.providers.get(id)?.isAvailable() === true);
  }

  listProviders(): ProviderInfo[] {
    const infos: ProviderInfo[] = [];
    for (const [, adapter] of this.providers) {
      infos.push({
        id: adapter.id,
        name: adapter.displayName,
        model: adapter.model,
        available: adapter.isAvailable(),
      });
    }
    return infos;
  }

  /**
   * Runs the same image and prompt through every available provider,
   * one after another. Unconfigured providers are left out.
   */
  async compare(image: Buffer, mediaType: MediaType, prompt: string): Promise<ComparisonResults> {
    const results: ComparisonResults = {};
    for (const id of this.availableProviders()) {
      results[id] = await this.analyze(id, image, mediaType, prompt);
    }
    return results;
  }
}
