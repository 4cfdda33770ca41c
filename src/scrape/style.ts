/**
 * style.ts
 *
 * The grid renders every block with inline styles such as
 * `position: absolute; left: 250px; top: 100px;`. These helpers read pixel
 * lengths back out of those attributes.
 */

// Returns null when the property is missing or not a px length.
export function readStylePx(style: string | null | undefined, property: string): number | null {
  if (!style) return null;

  const escaped = property.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const m = style.match(new RegExp(`(?:^|;)\\s*${escaped}\\s*:\\s*(-?\\d+(?:\\.\\d+)?)px`, 'i'));
  return m ? Number(m[1]) : null;
}

export function readStylePxOrNaN(style: string | null | undefined, property: string): number {
  return readStylePx(style, property) ?? Number.NaN;
}
