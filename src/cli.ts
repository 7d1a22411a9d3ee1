import fs from 'node:fs';
import path from 'node:path';
import { buildConverterArgs, formatCommand, runConverter } from './converter.js';
import { CliUsageError, FontToolError, UnsupportedLanguageError } from './errors.js';
import { checkFonts, resolveFontSet } from './fonts.js';
import { resolveRanges, supportedLanguages } from './ranges.js';
import type { ExecFn, GenerateOptions, GenerateResult, ToolConfig } from './types.js';

export const DEFAULT_SIZE = 16;
export const DEFAULT_BPP = 1;

/** Bit depths lv_font_conv accepts */
export const VALID_BPP: ReadonlySet<number> = new Set([1, 2, 3, 4, 8]);

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list-languages' }
  | ({ kind: 'generate' } & GenerateOptions);

export function usage(): string {
  return `Usage:
  lvfont-subset <language> --output <file> [--size <px>] [--bpp <bits>] [--dry-run]
  lvfont-subset --list-languages

Options:
  --output <file>    Output font file (required)
  --size <px>        Font size in pixels (default ${DEFAULT_SIZE})
  --bpp <bits>       Bits per pixel: 1, 2, 3, 4 or 8 (default ${DEFAULT_BPP})
  --dry-run          Print the lv_font_conv command without running it
  --list-languages   List supported language codes
  -h, --help         Show this help`;
}

function parsePositiveInt(flag: string, value: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) === 0) {
    throw new CliUsageError(`Invalid ${flag} value: ${value} (expected a positive integer)`);
  }
  return parseInt(value, 10);
}

export function parseSizeOption(value: string): number {
  return parsePositiveInt('--size', value);
}

export function parseBppOption(value: string): number {
  const bpp = parsePositiveInt('--bpp', value);
  if (!VALID_BPP.has(bpp)) {
    throw new CliUsageError(`Invalid --bpp value: ${value} (expected 1, 2, 3, 4 or 8)`);
  }
  return bpp;
}

export interface OptionValue {
  flag: string;
  value: string;
  /** Index of the last argv entry consumed */
  last: number;
}

/** Flag name of an option token, without any `=value` suffix */
export function optionName(arg: string): string {
  const eq = arg.indexOf('=');
  return eq === -1 ? arg : arg.slice(0, eq);
}

/**
 * Read the value of the option at argv[i], from `--flag=value` or from the
 * next entry. A following entry that is itself an option is not a value.
 */
export function readOptionValue(argv: readonly string[], i: number): OptionValue {
  const arg = argv[i]!;
  const eq = arg.indexOf('=');
  const flag = optionName(arg);

  if (eq !== -1) {
    const value = arg.slice(eq + 1);
    if (value === '') throw new CliUsageError(`Option ${flag} requires a value`);
    return { flag, value, last: i };
  }

  const next = argv[i + 1];
  if (next === undefined || next === '' || next.startsWith('-')) {
    throw new CliUsageError(`Option ${flag} requires a value`);
  }
  return { flag, value: next, last: i + 1 };
}

/**
 * Parse argv (without the node/script prefix). Accepts `--flag value` and
 * `--flag=value`. --help wins over everything else, then --list-languages.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let help = false;
  let listLanguages = false;
  let dryRun = false;
  let language: string | null = null;
  let output: string | null = null;
  let size = DEFAULT_SIZE;
  let bpp = DEFAULT_BPP;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    if (arg === '-h' || arg === '--help') { help = true; continue; }
    if (arg === '--list-languages') { listLanguages = true; continue; }
    if (arg === '--dry-run') { dryRun = true; continue; }

    if (arg.startsWith('-')) {
      const flag = optionName(arg);
      if (flag !== '--output' && flag !== '--size' && flag !== '--bpp') {
        throw new CliUsageError(`Unknown option: ${flag}`);
      }

      const { value, last } = readOptionValue(argv, i);
      i = last;

      if (flag === '--output') {
        output = value;
      } else if (flag === '--size') {
        size = parseSizeOption(value);
      } else {
        bpp = parseBppOption(value);
      }
      continue;
    }

    if (language !== null) {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }
    language = arg;
  }

  if (help) return { kind: 'help' };
  if (listLanguages) return { kind: 'list-languages' };

  if (language === null) {
    throw new CliUsageError('Missing language code');
  }
  if (output === null) {
    throw new CliUsageError('Missing required option --output');
  }

  return { kind: 'generate', language, output, size, bpp, dryRun };
}

/**
 * Resolve ranges for one language and run lv_font_conv on them.
 * Unsupported languages fail here, before anything is spawned or created.
 */
export function generateFont(
  options: GenerateOptions,
  config: ToolConfig,
  exec?: ExecFn,
): GenerateResult {
  const ranges = resolveRanges(options.language);
  const fonts = resolveFontSet(config.fontsDir);
  const args = buildConverterArgs({
    language: options.language,
    ranges,
    fonts,
    size: options.size,
    bpp: options.bpp,
    output: options.output,
  });
  const command = [config.converter, ...args];

  const fontChecks = checkFonts(options.language, fonts, ranges.high !== '');

  console.log('Running command:');
  console.log(formatCommand(config.converter, args));

  if (options.dryRun) {
    return { language: options.language, output: options.output, command, fonts: fontChecks, executed: false };
  }

  fs.mkdirSync(path.dirname(path.resolve(options.output)), { recursive: true });
  runConverter(config.converter, args, exec);
  console.log(`Generated font for ${options.language} at ${options.output}`);

  return { language: options.language, output: options.output, command, fonts: fontChecks, executed: true };
}

/**
 * CLI entry: returns the process exit code. Every FontToolError becomes a
 * one-line diagnostic on stderr and exit code 1; anything else propagates.
 */
export function runCli(argv: readonly string[], config: ToolConfig, exec?: ExecFn): number {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.error(usage());
      return 1;
    }
    throw err;
  }

  if (command.kind === 'help') {
    console.log(usage());
    return 0;
  }

  if (command.kind === 'list-languages') {
    for (const language of supportedLanguages()) {
      console.log(language);
    }
    return 0;
  }

  try {
    generateFont(command, config, exec);
    return 0;
  } catch (err) {
    if (err instanceof UnsupportedLanguageError) {
      console.error(err.message);
      console.error('Use --list-languages to see supported language codes.');
      return 1;
    }
    if (err instanceof FontToolError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}
