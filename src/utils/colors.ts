export type Rgba8 = readonly [r: number, g: number, b: number, a: number];

const clampByte = (v: number): number => Math.max(0, Math.min(255, Math.round(v)));

const parseHex = (hex: string): Rgba8 | null => {
  const h = hex.slice(1);
  if (!/^[0-9a-f]+$/i.test(h)) return null;
  switch (h.length) {
    case 3:
    case 4: {
      const r = parseInt(h[0] + h[0], 16);
      const g = parseInt(h[1] + h[1], 16);
      const b = parseInt(h[2] + h[2], 16);
      const a = h.length === 4 ? parseInt(h[3] + h[3], 16) : 255;
      return [r, g, b, a];
    }
    case 6:
    case 8: {
      const r = parseInt(h.slice(0, 2), 16);
      const g = parseInt(h.slice(2, 4), 16);
      const b = parseInt(h.slice(4, 6), 16);
      const a = h.length === 8 ? parseInt(h.slice(6, 8), 16) : 255;
      return [r, g, b, a];
    }
    default:
      return null;
  }
};

const parseChannel = (raw: string): number | null => {
  const s = raw.trim();
  if (s.endsWith('%')) {
    const p = Number(s.slice(0, -1));
    return Number.isFinite(p) ? clampByte((p / 100) * 255) : null;
  }
  const n = Number(s);
  return Number.isFinite(n) ? clampByte(n) : null;
};

const parseAlpha = (raw: string | undefined): number | null => {
  if (raw === undefined) return 255;
  const s = raw.trim();
  if (s.endsWith('%')) {
    const p = Number(s.slice(0, -1));
    return Number.isFinite(p) ? clampByte((p / 100) * 255) : null;
  }
  const n = Number(s);
  return Number.isFinite(n) ? clampByte(n * 255) : null;
};

/**
 * Parses `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb(...)` and `rgba(...)` into 0-255 channels.
 * Named colours are not supported; returns null for anything unparseable.
 */
export function parseCssColor(input: string): Rgba8 | null {
  const s = input.trim().toLowerCase();
  if (s.startsWith('#')) return parseHex(s);

  const m = s.match(/^rgba?\(([^)]*)\)$/);
  if (!m) return null;
  const parts = m[1].split(/[\s,/]+/).filter((p) => p.length > 0);
  if (parts.length !== 3 && parts.length !== 4) return null;

  const r = parseChannel(parts[0]);
  const g = parseChannel(parts[1]);
  const b = parseChannel(parts[2]);
  const a = parseAlpha(parts[3]);
  if (r === null || g === null || b === null || a === null) return null;
  return [r, g, b, a];
}
