import type { MenuItem, RawMenuRecord } from '../types/menu.js';

export type ValidationResult = { valid: true; item: MenuItem } | { valid: false; reason: string };

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/** Strips `$` and thousands separators, then requires a plain non-negative decimal. */
export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return null;
    // -0 passes the range check; report it as 0.
    return value === 0 ? 0 : value;
  }
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(/[$,]/g, '').trim();
  if (!DECIMAL_PATTERN.test(cleaned)) return null;

  const parsed = Number.parseFloat(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

function normalizeText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const str = value.trim();
  return str.length ? str : null;
}

function normalizeAvailable(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const flag = value.trim().toLowerCase();
    if (flag === 'false' || flag === 'no') return false;
  }
  return true;
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && !value.trim());
}

export function validateMenuItem(record: RawMenuRecord): ValidationResult {
  const title = normalizeText(record.title);
  if (!title) {
    return { valid: false, reason: "missing required field 'title'" };
  }

  const rawPrice = record.price;
  if (isMissing(rawPrice)) {
    return { valid: false, reason: "missing required field 'price'" };
  }
  const invalidPrice: ValidationResult = { valid: false, reason: `invalid price format: ${String(rawPrice)}` };
  if (typeof rawPrice !== 'string' && typeof rawPrice !== 'number') {
    return invalidPrice;
  }
  const priceNumeric = parsePrice(rawPrice);
  if (priceNumeric === null) {
    return invalidPrice;
  }

  return {
    valid: true,
    item: {
      slug: record.slug,
      title,
      price: rawPrice,
      priceNumeric,
      description: normalizeText(record.description) ?? '',
      category: record.category,
      available: normalizeAvailable(record.available),
      content: record.content,
      filePath: record.filePath,
    },
  };
}
