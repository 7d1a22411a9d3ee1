import fs from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_BPP,
  DEFAULT_SIZE,
  generateFont,
  optionName,
  parseBppOption,
  parseSizeOption,
  readOptionValue,
} from './cli.js';
import { CliUsageError, FontToolError } from './errors.js';
import { supportedLanguages } from './ranges.js';
import type { ExecFn, GenerateOptions, GenerateResult, ToolConfig } from './types.js';

export const FONT_EXTENSION = '.lvfontbin';

export type BatchOptions = Pick<GenerateOptions, 'size' | 'bpp' | 'dryRun'>;

export type BatchCommand =
  | { kind: 'help' }
  | ({ kind: 'generate-all'; outputDir: string } & BatchOptions);

export function batchUsage(): string {
  return `Usage:
  generate-all-fonts [--output-dir <dir>] [--size <px>] [--bpp <bits>] [--dry-run]

Options:
  --output-dir <dir> Where <lang>${FONT_EXTENSION} files go (default FONT_OUTPUT_DIR)
  --size <px>        Font size in pixels (default ${DEFAULT_SIZE})
  --bpp <bits>       Bits per pixel: 1, 2, 3, 4 or 8 (default ${DEFAULT_BPP})
  --dry-run          Print the lv_font_conv commands without running them
  -h, --help         Show this help`;
}

/**
 * Parse batch argv with the same option rules and validation as the
 * single-font CLI. A relative --output-dir resolves against the cwd.
 */
export function parseBatchArgs(argv: readonly string[], defaultOutputDir: string): BatchCommand {
  let help = false;
  let dryRun = false;
  let outputDir = defaultOutputDir;
  let size = DEFAULT_SIZE;
  let bpp = DEFAULT_BPP;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    if (arg === '-h' || arg === '--help') { help = true; continue; }
    if (arg === '--dry-run') { dryRun = true; continue; }

    if (!arg.startsWith('-')) {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }

    const flag = optionName(arg);
    if (flag !== '--output-dir' && flag !== '--size' && flag !== '--bpp') {
      throw new CliUsageError(`Unknown option: ${flag}`);
    }

    const { value, last } = readOptionValue(argv, i);
    i = last;

    if (flag === '--output-dir') {
      outputDir = path.resolve(value);
    } else if (flag === '--size') {
      size = parseSizeOption(value);
    } else {
      bpp = parseBppOption(value);
    }
  }

  if (help) return { kind: 'help' };
  return { kind: 'generate-all', outputDir, size, bpp, dryRun };
}

/**
 * Generate `<outputDir>/<lang>.lvfontbin` for every supported language, in
 * table order. The first failure aborts the batch.
 */
export function generateAllFonts(
  outputDir: string,
  config: ToolConfig,
  options: BatchOptions,
  exec?: ExecFn,
): GenerateResult[] {
  const languages = supportedLanguages();
  if (!options.dryRun) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const results: GenerateResult[] = [];
  for (const [i, language] of languages.entries()) {
    console.log(`\n[batch] ${i + 1}/${languages.length} ${language}`);
    const output = path.join(outputDir, `${language}${FONT_EXTENSION}`);
    results.push(generateFont({ ...options, language, output }, config, exec));
  }

  console.log(`\n[batch] ${results.length} fonts ${options.dryRun ? 'planned' : 'written'} to ${outputDir}`);
  return results;
}

/** Batch entry: returns the process exit code, like runCli */
export function runBatch(argv: readonly string[], config: ToolConfig, exec?: ExecFn): number {
  let command: BatchCommand;
  try {
    command = parseBatchArgs(argv, config.outputDir);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.error(batchUsage());
      return 1;
    }
    throw err;
  }

  if (command.kind === 'help') {
    console.log(batchUsage());
    return 0;
  }

  try {
    const { size, bpp, dryRun } = command;
    generateAllFonts(command.outputDir, config, { size, bpp, dryRun }, exec);
    return 0;
  } catch (err) {
    if (err instanceof FontToolError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}
