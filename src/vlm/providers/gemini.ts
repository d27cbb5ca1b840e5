// ============================================================
// Vision Analyzer - Google Gemini Provider
// generateContent with [prompt, inline image]
// ============================================================

import { GoogleGenAI } from '@google/genai';
import { CREDENTIAL_ENV_VARS, GEMINI_DEFAULTS } from '@shared/constants';
import type { MediaType } from '@shared/types';
import { encodeImage } from '../../utils/base64';
import type { VisionProvider } from './types';

export class GeminiVisionProvider implements VisionProvider {
  readonly id = 'gemini' as const;
  readonly displayName = 'Gemini Flash (Google)';
  readonly model = GEMINI_DEFAULTS.MODEL;

  constructor(private readonly apiKey: string | undefined) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  missingCredentialMessage(): string {
    return `Google API key not set. Set ${CREDENTIAL_ENV_VARS.gemini} environment variable.`;
  }

  async analyze(image: Buffer, mediaType: MediaType, prompt: string): Promise<string> {
    const ai = new GoogleGenAI({ apiKey: this.apiKey });

    const response = await ai.models.generateContent({
      model: this.model,
      contents: [
        prompt,
        { inlineData: { mimeType: mediaType, data: encodeImage(image) } },
      ],
    });

    const text = response.text;
    if (text === undefined) {
      throw new Error('Malformed Gemini response: no text in candidates');
    }
    return text;
  }
}
