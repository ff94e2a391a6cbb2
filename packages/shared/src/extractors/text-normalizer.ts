/**
 * Numeric normalization for text recovered from documents.
 */

/**
 * Clean numeric strings like '6,500' or '6\n500' -> 6500.
 *
 * Every non-digit is dropped, decimal points and signs included: source
 * documents only ever print whole, non-negative amounts. Anything that does
 * not leave a number behind is 0.
 */
export function cleanNumber(raw: string | null | undefined): number {
  if (!raw) return 0;

  const digits = raw.replace(/[^0-9]/g, '');
  if (digits === '') return 0;

  const value = Number(digits);
  return Number.isFinite(value) ? value : 0;
}
