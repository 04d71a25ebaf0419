// XML helpers for the KML writer

export function escapeXML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

/**
 * Relative URL for an archive entry. Each path segment is percent-encoded so
 * that '#', '?', '%' and spaces stay part of the name.
 */
export function entryHref(entryName: string): string {
  return entryName.split('/').map(encodeURIComponent).join('/')
}

/**
 * Wrap markup in CDATA. A literal "]]>" is split across two sections.
 */
export function cdata(text: string): string {
  return `<![CDATA[${text.replace(/]]>/g, ']]]]><![CDATA[>')}]]>`
}

/**
 * Shortest decimal form with at most `precision` fractional digits
 * (1.500000 -> 1.5, -0 -> 0).
 */
export function formatNumber(value: number, precision: number = 8): string {
  const fixed = Number(value.toFixed(precision))
  return Object.is(fixed, -0) ? '0' : String(fixed)
}
