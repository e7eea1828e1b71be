/**
 * Picks a line colour for `forAttribute`:
 * the first palette colour nobody uses, otherwise the least-used one
 * (ignoring `forAttribute`'s own current colour), ties going to palette order.
 */
export function pickLineColor(
  configs: Readonly<Record<string, { readonly color?: string }>>,
  palette: ReadonlyArray<string>,
  forAttribute?: string
): string {
  if (palette.length === 0) {
    throw new Error('pickLineColor: palette must not be empty.');
  }

  const usage = new Map<string, number>();
  for (const id of Object.keys(configs)) {
    if (id === forAttribute) continue;
    const color = configs[id].color;
    if (color === undefined) continue;
    usage.set(color, (usage.get(color) ?? 0) + 1);
  }

  const unused = palette.find((c) => !usage.has(c));
  if (unused !== undefined) return unused;

  let best = palette[0];
  let bestCount = usage.get(best) ?? 0;
  for (let i = 1; i < palette.length; i++) {
    const count = usage.get(palette[i]) ?? 0;
    if (count < bestCount) {
      best = palette[i];
      bestCount = count;
    }
  }
  return best;
}
