/**
 * Chilean RUT/RUN: digits plus a check digit (0-9 or K). Dots, dashes and
 * spaces are separators; leading zeros carry no meaning.
 */
export function normalizeRut(value: string): string {
  const compact = value.replace(/[.\-\s]/g, '').toUpperCase();
  return compact.replace(/^0+(?=\d)/, '');
}

export function normalizePlain(value: string): string {
  return value.toUpperCase().replace(/\s+/g, ' ').trim();
}

const DECORATIVE_EDGES = /^[\s\-–—_*.:·•=~]+|[\s\-–—_*.:·•=~]+$/g;

/** Upper-cased, accent-free, whitespace-collapsed text without decorative leading/trailing marks. */
export function normalizeDeclaredValue(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, ' ')
    .replace(DECORATIVE_EDGES, '')
    .toUpperCase();
}

/** Used when comparing an extraction against the registry's official copy. */
export function normalizeForCompare(value: string | null | undefined): string {
  if (!value) return '';
  return value.toUpperCase().replace(/\s+/g, ' ').trim();
}
