import { execFileSync } from 'node:child_process';
import { ConverterFailedError, ConverterNotFoundError } from './errors.js';
import { baseFontFor } from './fonts.js';
import { ICON_FONT_RANGE } from './unicode-ranges.js';
import type { ConverterRequest, ExecFn } from './types.js';

/**
 * Build the lv_font_conv argument list (without the executable).
 *
 * One --font/-r pair per source font: the base (or CJK) font for the low
 * ranges, the upper font for the high ranges when there are any, and the
 * icon font for the private use area. Unifont pairs get --autohint-off.
 */
export function buildConverterArgs(req: ConverterRequest): string[] {
  const args = [
    '--font', baseFontFor(req.language, req.fonts),
    '--autohint-off',
    '-r', req.ranges.low,
  ];

  if (req.ranges.high) {
    args.push('--font', req.fonts.upper, '--autohint-off', '-r', req.ranges.high);
  }

  args.push('--font', req.fonts.icon, '-r', ICON_FONT_RANGE);

  args.push(
    '--size', String(req.size),
    '--format', 'bin',
    '--bpp', String(req.bpp),
    '--no-compress',
    '-o', req.output,
  );

  return args;
}

/** Printable form of the command, as echoed before running it */
export function formatCommand(executable: string, args: readonly string[]): string {
  return [executable, ...args].join(' ');
}

/** Runs the converter in the foreground, output straight to our terminal */
export const execInherit: ExecFn = (executable, args) => {
  execFileSync(executable, args, { stdio: 'inherit' });
};

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

function exitStatus(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

/**
 * Run the converter once. No timeout and no retry: a missing executable
 * becomes ConverterNotFoundError, any other failure ConverterFailedError.
 */
export function runConverter(
  executable: string,
  args: readonly string[],
  exec: ExecFn = execInherit,
): void {
  try {
    exec(executable, args);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new ConverterNotFoundError(executable, { cause: err });
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConverterFailedError(executable, exitStatus(err), detail, { cause: err });
  }
}
