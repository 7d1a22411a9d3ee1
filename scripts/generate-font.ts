/**
 * generate-font.ts
 *
 * Build an LVGL binary font for one language: resolve its Unicode ranges and
 * hand them to lv_font_conv together with the Unifont, Unifont upper and
 * Nerd Font sources.
 *
 * Usage:
 *   npx tsx scripts/generate-font.ts en_US --output output/en_US.lvfontbin
 *   npx tsx scripts/generate-font.ts ja --output output/ja.lvfontbin --size 24 --bpp 2
 *   npx tsx scripts/generate-font.ts ru --output ru.lvfontbin --dry-run
 *   npx tsx scripts/generate-font.ts --list-languages
 */

import '../src/main.js';
