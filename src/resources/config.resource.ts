import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import type { Config } from '../config/env.js';

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'authorization', 'apikey', 'api_key'];

export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...obj };
  for (const [k, v] of Object.entries(copy)) {
    if (SENSITIVE_KEYS.some((s) => k.toLowerCase().includes(s))) {
      copy[k] = '[REDACTED]';
    } else if (typeof v === 'object' && v !== null && !Array.isArray(v)) {
      copy[k] = redactSensitive({ ...v });
    }
  }
  return copy;
}

export const configResource = {
  uri: 'config://server',
  name: 'Server Configuration',
  description: 'Current server configuration (sensitive data redacted)',
  mimeType: 'application/json',

  handler: async (config: Config): Promise<ReadResourceResult> => {
    const safe = redactSensitive({ ...config });
    return {
      contents: [
        {
          uri: 'config://server',
          name: 'server-config.json',
          mimeType: 'application/json',
          text: JSON.stringify(safe, null, 2),
        },
      ],
    };
  },
} as const;
