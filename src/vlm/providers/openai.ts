// ============================================================
// Vision Analyzer - OpenAI Provider
// GPT-4o chat completions with an inline data-URI image
// ============================================================

import OpenAI from 'openai';
import { CREDENTIAL_ENV_VARS, OPENAI_DEFAULTS } from '@shared/constants';
import type { MediaType } from '@shared/types';
import { encodeImage, toDataURL } from '../../utils/base64';
import type { VisionProvider } from './types';

export class OpenAIVisionProvider implements VisionProvider {
  readonly id = 'gpt4o' as const;
  readonly displayName = 'GPT-4o (OpenAI)';
  readonly model = OPENAI_DEFAULTS.MODEL;

  constructor(private readonly apiKey: string | undefined) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  missingCredentialMessage(): string {
    return `OpenAI API key not set. Set ${CREDENTIAL_ENV_VARS.gpt4o} environment variable.`;
  }

  async analyze(image: Buffer, mediaType: MediaType, prompt: string): Promise<string> {
    // No SDK-level retries: a failed call is reported, not repeated
    const client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });

    const response = await client.chat.completions.create({
      model: this.model,
      max_tokens: OPENAI_DEFAULTS.MAX_TOKENS,
      temperature: OPENAI_DEFAULTS.TEMPERATURE,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            {
              type: 'image_url',
              image_url: {
                url: toDataURL(encodeImage(image), mediaType),
                detail: OPENAI_DEFAULTS.IMAGE_DETAIL,
              },
            },
          ],
        },
      ],
    });

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Malformed OpenAI response: no completion text');
    }
    return content;
  }
}
