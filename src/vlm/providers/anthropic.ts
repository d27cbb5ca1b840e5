// ============================================================
// Vision Analyzer - Anthropic Provider
// Claude Sonnet messages API: image block, then text block
// ============================================================

import Anthropic from '@anthropic-ai/sdk';
import { ANTHROPIC_DEFAULTS, CREDENTIAL_ENV_VARS } from '@shared/constants';
import type { MediaType } from '@shared/types';
import { encodeImage } from '../../utils/base64';
import type { VisionProvider } from './types';

export class AnthropicVisionProvider implements VisionProvider {
  readonly id = 'claude' as const;
  readonly displayName = 'Claude Sonnet 4.5 (Anthropic)';
  readonly model = ANTHROPIC_DEFAULTS.MODEL;

  constructor(private readonly apiKey: string | undefined) {}

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  missingCredentialMessage(): string {
    return `Anthropic API key not set. Set ${CREDENTIAL_ENV_VARS.claude} environment variable.`;
  }

  async analyze(image: Buffer, mediaType: MediaType, prompt: string): Promise<string> {
    const client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });

    const message = await client.messages.create({
      model: this.model,
      max_tokens: ANTHROPIC_DEFAULTS.MAX_TOKENS,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: mediaType,
                data: encodeImage(image),
              },
            },
            {
              type: 'text',
              text: prompt,
            },
          ],
        },
      ],
    });

    const first = message.content?.[0];
    if (!first || first.type !== 'text') {
      throw new Error('Malformed Anthropic response: first content block is not text');
    }
    return first.text;
  }
}
