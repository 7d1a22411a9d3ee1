import fs from 'node:fs';
import path from 'node:path';
import { CJK_LANGUAGE } from './unicode-ranges.js';
import type { FontCheck, FontRole, FontSet } from './types.js';

/** Source font filenames, relative to the fonts directory */
const FONT_FILES: Record<FontRole, string> = {
  base: 'unifont-16.0.02.otf',
  cjk: 'unifont_jp-16.0.02.otf',
  upper: 'unifont_upper-16.0.02.otf',
  icon: 'SymbolsNerdFontMono-Regular.ttf',
};

export function resolveFontSet(fontsDir: string): FontSet {
  return {
    base: path.resolve(fontsDir, FONT_FILES.base),
    cjk: path.resolve(fontsDir, FONT_FILES.cjk),
    upper: path.resolve(fontsDir, FONT_FILES.upper),
    icon: path.resolve(fontsDir, FONT_FILES.icon),
  };
}

/** Japanese gets the unifont_jp glyph variants in place of plain Unifont */
export function baseFontFor(language: string, fonts: FontSet): string {
  return language === CJK_LANGUAGE ? fonts.cjk : fonts.base;
}

/**
 * Check which of the fonts a language needs are present on disk.
 * Only a warning: lv_font_conv reports the real error if one is missing.
 */
export function checkFonts(language: string, fonts: FontSet, needUpper: boolean): FontCheck[] {
  const roles: FontRole[] = [language === CJK_LANGUAGE ? 'cjk' : 'base'];
  if (needUpper) roles.push('upper');
  roles.push('icon');

  const checks: FontCheck[] = [];
  for (const role of roles) {
    const fontPath = fonts[role];
    const available = fs.existsSync(fontPath);
    if (available) {
      console.log(`  [font] found: ${role} (${fontPath})`);
    } else {
      console.warn(`  [font] not found: ${role} (${fontPath})`);
    }
    checks.push({ role, path: fontPath, available });
  }

  return checks;
}
