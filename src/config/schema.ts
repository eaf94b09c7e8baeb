/**
 * Configuration Schema
 *
 * Zod schema for the gateway's environment variables, kept apart from the
 * loader so it can be validated without side effects.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'], { message: 'must be "true" or "false"' })
  .default('false')
  .transform((value) => value === 'true');

/**
 * Configuration schema with validation rules
 */
export const configSchema = z
  .object({
    // Google OAuth client
    googleClientId: z
      .string({ message: 'GOOGLE_CLIENT_ID is required' })
      .min(1, 'GOOGLE_CLIENT_ID cannot be empty'),

    googleClientSecret: z
      .string({ message: 'GOOGLE_CLIENT_SECRET is required' })
      .min(1, 'GOOGLE_CLIENT_SECRET cannot be empty'),

    googleRedirectUri: z
      .string()
      .url('GOOGLE_REDIRECT_URI must be a valid URL')
      .default('http://localhost:3000/auth/callback'),

    // Session cookie signing
    sessionSecret: z
      .string({ message: 'SESSION_SECRET is required' })
      .min(32, 'SESSION_SECRET must be at least 32 characters'),

    cookieSecure: booleanFlag,

    // Authorization flow timing
    stateTtlSeconds: z.coerce
      .number()
      .int()
      .positive('STATE_TTL_SECONDS must be positive')
      .default(600),

    tokenRequestTimeoutMs: z.coerce
      .number()
      .int()
      .positive('TOKEN_REQUEST_TIMEOUT_MS must be positive')
      .default(10_000),

    expirySkewSeconds: z.coerce
      .number()
      .int()
      .min(0, 'EXPIRY_SKEW_SECONDS cannot be negative')
      .default(60),

    // HTTP server
    httpPort: z.coerce
      .number()
      .int()
      .min(1, 'HTTP_PORT must be between 1 and 65535')
      .max(65535, 'HTTP_PORT must be between 1 and 65535')
      .default(3000),

    // Credential persistence
    credentialStore: z.enum(['memory', 'sqlite']).default('memory'),

    databasePath: z.string().default('./data/credentials.db'),

    encryptionKey: z
      .string()
      .length(64, 'ENCRYPTION_KEY must be 64 hex characters (32 bytes)')
      .regex(/^[a-fA-F0-9]+$/, 'ENCRYPTION_KEY must be a valid hex string')
      .optional(),
  })
  .superRefine((value, ctx) => {
    if (value.credentialStore === 'sqlite' && !value.encryptionKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['encryptionKey'],
        message: 'ENCRYPTION_KEY is required when CREDENTIAL_STORE=sqlite',
      });
    }
  });

/**
 * Configuration type (inferred from schema)
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Map environment variables onto the schema's field names.
 * Empty strings are treated as unset so defaults apply.
 */
export function readEnvironment(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };

  return {
    googleClientId: pick('GOOGLE_CLIENT_ID'),
    googleClientSecret: pick('GOOGLE_CLIENT_SECRET'),
    googleRedirectUri: pick('GOOGLE_REDIRECT_URI'),
    sessionSecret: pick('SESSION_SECRET'),
    cookieSecure: pick('COOKIE_SECURE'),
    stateTtlSeconds: pick('STATE_TTL_SECONDS'),
    tokenRequestTimeoutMs: pick('TOKEN_REQUEST_TIMEOUT_MS'),
    expirySkewSeconds: pick('EXPIRY_SKEW_SECONDS'),
    httpPort: pick('HTTP_PORT'),
    credentialStore: pick('CREDENTIAL_STORE'),
    databasePath: pick('DATABASE_PATH'),
    encryptionKey: pick('ENCRYPTION_KEY'),
  };
}
