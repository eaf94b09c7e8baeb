/**
 * Configuration Module
 *
 * Loads environment variables (from .env when present) and validates them.
 * Fails fast with every issue listed if configuration is invalid.
 */

import dotenv from 'dotenv';
import { configSchema, readEnvironment, type Config } from './schema';

export type { Config };

dotenv.config();

function loadConfig(): Config {
  const result = configSchema.safeParse(readEnvironment(process.env));

  if (!result.success) {
    console.error('');
    console.error('Configuration error. The following problems were found:');
    console.error('');

    result.error.issues.forEach((issue) => {
      const path = issue.path.join('.') || 'unknown';
      console.error(`  • ${path}: ${issue.message}`);
    });

    console.error('');
    console.error('Check your .env file; see .env.example for reference.');
    console.error('');

    process.exit(1);
  }

  return result.data;
}

/**
 * Validated configuration, loaded once at startup
 */
export const config = loadConfig();
