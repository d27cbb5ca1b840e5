// ============================================================
// Vision Analyzer - Library Facade
// File-oriented entry point used by the CLI and the server
// ============================================================

import path from 'node:path';
import fs from 'fs-extra';
import { credentialsFromEnv } from './config';
import { DEFAULT_ANALYSIS_TYPE, DEFAULT_PROVIDER } from '@shared/constants';
import type {
  AnalysisRequest,
  AnalysisResult,
  ComparisonResults,
  ProviderCredentials,
} from '@shared/types';
import { mediaTypeFromFilename } from './utils/media-type';
import { VisionDispatcher, createProviders, resolvePrompt } from './vlm';

export interface VisionAnalyzerOptions extends ProviderCredentials {
  /** Source for keys not given explicitly; defaults to process.env */
  env?: Record<string, string | undefined>;
}

export interface AnalyzeFileOptions {
  provider?: string;
  analysisType?: string;
  customPrompt?: string;
}

type LoadedImage = { ok: true; image: Buffer } | { ok: false; error: string };

export const DEFAULT_RESULTS_FILE = 'analysis_results.json';

export class VisionAnalyzer {
  readonly dispatcher: VisionDispatcher;

  constructor(options: VisionAnalyzerOptions = {}) {
    const fromEnv = credentialsFromEnv(options.env);
    this.dispatcher = new VisionDispatcher(
      createProviders({
        openaiApiKey: options.openaiApiKey ?? fromEnv.openaiApiKey,
        anthropicApiKey: options.anthropicApiKey ?? fromEnv.anthropicApiKey,
        googleApiKey: options.googleApiKey ?? fromEnv.googleApiKey,
      }),
    );
  }

  /** Resolves the prompt for an in-memory request and dispatches it */
  analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const prompt = resolvePrompt(request.analysisType, request.customPrompt);
    return this.dispatcher.analyze(request.provider, request.image, request.mediaType, prompt);
  }

  async analyzeFile(imagePath: string, options: AnalyzeFileOptions = {}): Promise<AnalysisResult> {
    const loaded = await loadImage(imagePath);
    if (!loaded.ok) {
      return { success: false, error: loaded.error };
    }

    return this.analyze({
      image: loaded.image,
      mediaType: mediaTypeFromFilename(imagePath),
      provider: options.provider ?? DEFAULT_PROVIDER,
      analysisType: options.analysisType ?? DEFAULT_ANALYSIS_TYPE,
      customPrompt: options.customPrompt,
    });
  }

  /**
   * Runs one image through every configured provider.
   * An unreadable file yields the same failure for each of them.
   */
  async compareModels(
    imagePath: string,
    analysisType: string = DEFAULT_ANALYSIS_TYPE,
  ): Promise<ComparisonResults> {
    const loaded = await loadImage(imagePath);
    if (!loaded.ok) {
      const results: ComparisonResults = {};
      for (const id of this.dispatcher.availableProviders()) {
        results[id] = { success: false, error: loaded.error };
      }
      return results;
    }

    return this.dispatcher.compare(
      loaded.image,
      mediaTypeFromFilename(imagePath),
      resolvePrompt(analysisType),
    );
  }

  /**
   * Writes results as pretty-printed JSON, creating parent directories.
   * @returns the absolute path written
   */
  async saveResults(
    results: ComparisonResults | AnalysisResult,
    outputFile: string = DEFAULT_RESULTS_FILE,
  ): Promise<string> {
    const target = path.resolve(outputFile);
    await fs.outputJson(target, results, { spaces: 2 });
    console.log(`[analyzer] Results saved to ${target}`);
    return target;
  }
}

async function loadImage(imagePath: string): Promise<LoadedImage> {
  try {
    return { ok: true, image: await fs.readFile(imagePath) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `Could not read image: ${message}` };
  }
}
