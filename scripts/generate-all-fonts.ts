/**
 * generate-all-fonts.ts
 *
 * Generate a font for every supported language into FONT_OUTPUT_DIR
 * (default: output/), one <lang>.lvfontbin each. Stops at the first failure.
 *
 * Usage:
 *   npx tsx scripts/generate-all-fonts.ts
 *   npx tsx scripts/generate-all-fonts.ts --output-dir dist-fonts --size 24
 *   npx tsx scripts/generate-all-fonts.ts --dry-run
 */

import { runBatch } from '../src/batch.js';
import { loadConfig, loadEnvFile } from '../src/config.js';

loadEnvFile();
process.exitCode = runBatch(process.argv.slice(2), loadConfig());
