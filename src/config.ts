// ============================================================
// Vision Analyzer - Credential Loading
// ============================================================

import { CREDENTIAL_ENV_VARS } from '@shared/constants';
import type { ProviderCredentials } from '@shared/types';

type Env = Record<string, string | undefined>;

function readKey(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Reads the three provider API keys from environment-style variables.
 * Missing keys stay undefined; the dispatcher reports them per call.
 */
export function credentialsFromEnv(env: Env = process.env): ProviderCredentials {
  return {
    openaiApiKey: readKey(env, CREDENTIAL_ENV_VARS.gpt4o),
    anthropicApiKey: readKey(env, CREDENTIAL_ENV_VARS.claude),
    googleApiKey: readKey(env, CREDENTIAL_ENV_VARS.gemini),
  };
}
