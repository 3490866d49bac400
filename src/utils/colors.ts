/**
 * Color utilities for scene encoding
 */

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface HlsColor {
  h: number;
  l: number;
  s: number;
}

const HEX_COLOR_PATTERN = /^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

// High-contrast categorical palette, repeated when entities outnumber it
export const DEFAULT_ENTITY_PALETTE: readonly string[] = [
  '#3366CC', '#DC3912', '#FF9900', '#109618', '#990099',
  '#0099C6', '#DD4477', '#66AA00', '#B82E2E', '#316395',
  '#994499', '#22AA99', '#AAAA11', '#6633CC', '#E67300'
];

export function isHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value);
}

/**
 * Parses #rgb or #rrggbb into channels in [0, 1]
 */
export function parseHexColor(hex: string): RgbColor {
  const match = HEX_COLOR_PATTERN.exec(hex);
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }

  let digits = match[1];
  if (digits.length === 3) {
    digits = digits.split('').map(digit => digit + digit).join('');
  }

  return {
    r: parseInt(digits.slice(0, 2), 16) / 255,
    g: parseInt(digits.slice(2, 4), 16) / 255,
    b: parseInt(digits.slice(4, 6), 16) / 255
  };
}

/**
 * Channels are truncated, not rounded, when converted back to bytes
 */
export function toHexColor(color: RgbColor): string {
  const toByte = (channel: number): string => {
    const byte = Math.floor(Math.min(1, Math.max(0, channel)) * 255);
    return byte.toString(16).padStart(2, '0');
  };

  return `#${toByte(color.r)}${toByte(color.g)}${toByte(color.b)}`;
}

export function rgbToHls({ r, g, b }: RgbColor): HlsColor {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const sum = max + min;
  const range = max - min;
  const l = sum / 2;

  if (range === 0) {
    return { h: 0, l, s: 0 };
  }

  const s = l <= 0.5 ? range / sum : range / (2 - sum);
  const rc = (max - r) / range;
  const gc = (max - g) / range;
  const bc = (max - b) / range;

  let h: number;
  if (r === max) {
    h = bc - gc;
  } else if (g === max) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }

  return { h: wrapUnit(h / 6), l, s };
}

export function hlsToRgb({ h, l, s }: HlsColor): RgbColor {
  if (s === 0) {
    return { r: l, g: l, b: l };
  }

  const m2 = l <= 0.5 ? l * (1 + s) : l + s - l * s;
  const m1 = 2 * l - m2;

  return {
    r: hueChannel(m1, m2, h + 1 / 3),
    g: hueChannel(m1, m2, h),
    b: hueChannel(m1, m2, h - 1 / 3)
  };
}

/**
 * Raises lightness toward white by `amount` of the remaining headroom,
 * keeping hue and saturation
 */
export function lightenColor(hex: string, amount: number): string {
  const hls = rgbToHls(parseHexColor(hex));
  const l = Math.min(1, hls.l + amount * (1 - hls.l));
  return toHexColor(hlsToRgb({ ...hls, l }));
}

/**
 * Palette lookup that wraps around instead of running out
 */
export function paletteColor(palette: readonly string[], index: number): string {
  if (palette.length === 0) {
    throw new Error('Color palette must not be empty');
  }

  return palette[((index % palette.length) + palette.length) % palette.length];
}

function wrapUnit(value: number): number {
  return ((value % 1) + 1) % 1;
}

function hueChannel(m1: number, m2: number, hue: number): number {
  const h = wrapUnit(hue);
  if (h < 1 / 6) {
    return m1 + (m2 - m1) * h * 6;
  }
  if (h < 0.5) {
    return m2;
  }
  if (h < 2 / 3) {
    return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  }
  return m1;
}
