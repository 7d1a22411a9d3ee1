import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadDotenv } from 'dotenv';
import type { ToolConfig } from './types.js';

export const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const DEFAULT_CONVERTER = 'lv_font_conv';

/**
 * Load `.env` from the project root into process.env. Variables already set
 * in the environment win. A missing file is not an error.
 */
export function loadEnvFile(envPath = path.join(PROJECT_ROOT, '.env')): void {
  loadDotenv({ path: envPath });
}

/** Empty strings count as unset */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the tool config from environment variables.
 * Relative directories resolve against the project root.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolConfig {
  const fontsDir = envValue(env, 'FONTS_DIR') ?? 'fonts';
  const outputDir = envValue(env, 'FONT_OUTPUT_DIR') ?? 'output';

  return {
    converter: envValue(env, 'LV_FONT_CONV') ?? DEFAULT_CONVERTER,
    fontsDir: path.resolve(PROJECT_ROOT, fontsDir),
    outputDir: path.resolve(PROJECT_ROOT, outputDir),
  };
}
