import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { generateAllFonts, parseBatchArgs, runBatch } from '../../src/batch.js';
import { CliUsageError, ConverterFailedError } from '../../src/errors.js';
import type { ToolConfig } from '../../src/types.js';

describe('generateAllFonts', () => {
  let tmp: string;
  let config: ToolConfig;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'lvfont-batch-'));
    config = { converter: 'lv_font_conv', fontsDir: path.join(tmp, 'fonts'), outputDir: path.join(tmp, 'output') };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('writes one font per language in table order', () => {
    const exec = vi.fn();
    const results = generateAllFonts(config.outputDir, config, { size: 16, bpp: 1, dryRun: false }, exec);

    expect(results).toHaveLength(21);
    expect(exec).toHaveBeenCalledTimes(21);
    expect(fs.existsSync(config.outputDir)).toBe(true);
    expect(results[0]!.output).toBe(path.join(config.outputDir, 'cs.lvfontbin'));
    expect(results[20]!.output).toBe(path.join(config.outputDir, 'zh_Latn_pinyin.lvfontbin'));

    const ja = results.find(r => r.language === 'ja');
    expect(ja?.command[2]).toBe(path.join(tmp, 'fonts', 'unifont_jp-16.0.02.otf'));
  });

  it('stops at the first converter failure', () => {
    let calls = 0;
    const exec = vi.fn(() => {
      calls++;
      if (calls === 3) throw Object.assign(new Error('Command failed: lv_font_conv'), { status: 1 });
    });

    expect(() => generateAllFonts(config.outputDir, config, { size: 16, bpp: 1, dryRun: false }, exec))
      .toThrow(ConverterFailedError);
    expect(exec).toHaveBeenCalledTimes(3);
  });

  it('plans without running or creating anything on a dry run', () => {
    const exec = vi.fn();
    const results = generateAllFonts(config.outputDir, config, { size: 24, bpp: 2, dryRun: true }, exec);

    expect(exec).not.toHaveBeenCalled();
    expect(results.every(r => !r.executed)).toBe(true);
    expect(fs.existsSync(config.outputDir)).toBe(false);
  });
});

describe('parseBatchArgs', () => {
  it('applies defaults', () => {
    expect(parseBatchArgs([], '/srv/output')).toEqual({
      kind: 'generate-all',
      outputDir: '/srv/output',
      size: 16,
      bpp: 1,
      dryRun: false,
    });
  });

  it('reads every option', () => {
    expect(parseBatchArgs(['--output-dir', '/tmp/fonts', '--size=24', '--bpp', '4', '--dry-run'], '/srv/output')).toEqual({
      kind: 'generate-all',
      outputDir: '/tmp/fonts',
      size: 24,
      bpp: 4,
      dryRun: true,
    });
  });

  it('resolves a relative output directory against the cwd', () => {
    const command = parseBatchArgs(['--output-dir', 'fonts-out'], '/srv/output');
    expect(command).toMatchObject({ outputDir: path.resolve('fonts-out') });
  });

  it('returns help', () => {
    expect(parseBatchArgs(['--size', '12', '-h'], '/srv/output')).toEqual({ kind: 'help' });
  });

  it.each<[string[], string]>([
    [['--bpp', '5'], 'Invalid --bpp value: 5 (expected 1, 2, 3, 4 or 8)'],
    [['--size', '16px'], 'Invalid --size value: 16px (expected a positive integer)'],
    [['--size'], 'Option --size requires a value'],
    [['--output-dir'], 'Option --output-dir requires a value'],
    [['--output-dir', '--dry-run'], 'Option --output-dir requires a value'],
    [['--output', 'x'], 'Unknown option: --output'],
    [['en_US'], 'Unexpected argument: en_US'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseBatchArgs(argv, '/srv/output')).toThrow(new CliUsageError(message));
  });
});

describe('runBatch', () => {
  let tmp: string;
  let config: ToolConfig;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'lvfont-run-batch-'));
    config = { converter: 'lv_font_conv', fontsDir: path.join(tmp, 'fonts'), outputDir: path.join(tmp, 'output') };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('exits 1 on an invalid --bpp without running anything', () => {
    const exec = vi.fn();
    expect(runBatch(['--dry-run', '--bpp', '5'], config, exec)).toBe(1);
    expect(exec).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('Invalid --bpp value: 5 (expected 1, 2, 3, 4 or 8)');
  });

  it('passes size and bpp through to every converter run', () => {
    const exec = vi.fn();
    expect(runBatch(['--size', '24', '--bpp', '2'], config, exec)).toBe(0);

    expect(exec).toHaveBeenCalledTimes(21);
    const args: string[] = exec.mock.calls[0]![1];
    expect(args[args.indexOf('--size') + 1]).toBe('24');
    expect(args[args.indexOf('--bpp') + 1]).toBe('2');
    expect(args[args.length - 1]).toBe(path.join(config.outputDir, 'cs.lvfontbin'));
  });

  it('exits 1 when a converter run fails', () => {
    const exec = vi.fn(() => {
      throw Object.assign(new Error('Command failed: lv_font_conv'), { status: 1 });
    });
    expect(runBatch([], config, exec)).toBe(1);
    expect(exec).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith('Error running lv_font_conv: Command failed: lv_font_conv');
  });
});
