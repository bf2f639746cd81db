/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access. Values are read once at import
 * time and validated with zod.
 *
 * Environment variables:
 * - GLG_DATA_ROOT: Base directory for date-partitioned paths (default ./data)
 * - GLG_DEFAULT_EXTENSION: Extension for records created without one (default fit)
 * - GLG_INCLUDE_HIDDEN: Set to 'true' to include dot-files in CLI scans
 */

import 'dotenv/config';
import { z } from 'zod';

export interface AppConfig {
  /** Root under which YYYY-MM-DD directories live */
  dataRoot: string;
  /** Extension used when a record is created without one */
  defaultExtension: string;
  /** Whether CLI scans include hidden entries */
  includeHidden: boolean;
}

const AppConfigSchema = z.object({
  dataRoot: z.string().min(1),
  defaultExtension: z.string().min(1).regex(/^[^/\\]+$/, 'must not contain path separators'),
  includeHidden: z.boolean(),
});

/**
 * Builds the configuration from an environment map.
 * Exported so tests can exercise it without touching process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = AppConfigSchema.safeParse({
    dataRoot: env.GLG_DATA_ROOT || './data',
    defaultExtension: env.GLG_DEFAULT_EXTENSION || 'fit',
    includeHidden: env.GLG_INCLUDE_HIDDEN === 'true',
  });

  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(
      `Invalid configuration: ${detail}. ` +
      `Copy .env.example to .env and fix the values.`
    );
  }
  return result.data;
}

export const appConfig: AppConfig = loadConfig(process.env);
