import type { MediaType, ProviderId } from '@shared/types';

/**
 * A remote vision model behind one request shape.
 * `analyze` throws on any remote failure; the dispatcher turns that into a value.
 */
export interface VisionProvider {
  readonly id: ProviderId;
  /** Human-readable name for UIs and logs */
  readonly displayName: string;
  /** Model identifier sent to the remote API */
  readonly model: string;
  /** Whether the adapter can be called (credential configured) */
  isAvailable(): boolean;
  missingCredentialMessage(): string;
  analyze(image: Buffer, mediaType: MediaType, prompt: string): Promise<string>;
}
