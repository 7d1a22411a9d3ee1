/** A closed code point range, with the text it was parsed from */
export interface Interval {
  start: number;
  end: number;
  /** Original token, e.g. "0x0400-0x04FF". Emitted as-is, never re-serialised. */
  token: string;
}

/** Output of resolveRanges: comma-joined tokens on each side of the BMP limit */
export interface PartitionedRanges {
  /** Intervals starting below 0x10000 */
  low: string;
  /** Intervals starting at or above 0x10000 (empty string when none) */
  high: string;
}

/** Absolute paths of the four fonts glyphs are merged from */
export interface FontSet {
  /** Unifont, covers the BMP */
  base: string;
  /** Unifont with Japanese glyph variants, replaces `base` for ja */
  cjk: string;
  /** Unifont upper, covers code points >= 0x10000 */
  upper: string;
  /** Nerd Font symbols, restricted to the private use area */
  icon: string;
}

export type FontRole = keyof FontSet;

/** Availability of one font file on disk */
export interface FontCheck {
  role: FontRole;
  path: string;
  available: boolean;
}

/** Everything buildConverterArgs needs for one font */
export interface ConverterRequest {
  language: string;
  ranges: PartitionedRanges;
  fonts: FontSet;
  size: number;
  bpp: number;
  output: string;
}

/** Runs an executable to completion. Throws on spawn failure or non-zero exit. */
export type ExecFn = (executable: string, args: readonly string[]) => void;

export interface ToolConfig {
  /** Converter executable name or path */
  converter: string;
  fontsDir: string;
  outputDir: string;
}

export interface GenerateOptions {
  language: string;
  output: string;
  size: number;
  bpp: number;
  /** Print the converter command without running it */
  dryRun: boolean;
}

export interface GenerateResult {
  language: string;
  output: string;
  command: string[];
  /** Presence of the source fonts this language needs */
  fonts: FontCheck[];
  /** False for dry runs */
  executed: boolean;
}
