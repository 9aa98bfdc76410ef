/**
 * Plain-text formatting helpers + shared utility types.
 *
 * Outbound text uses the lightweight markdown most chat clients accept:
 *   *bold*  _italic_
 * Transport bindings translate it further if they need to.
 */

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations that can fail in an expected way.
 *
 * @example
 * ```ts
 * function parsePrice(raw: string): Result<number> {
 *   if (Number.isNaN(Number(raw))) return { ok: false, error: 'Not a number' };
 *   return { ok: true, value: Number(raw) };
 * }
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Bold text */
export function bold(text: string): string {
  return `*${text}*`;
}

/** Italic text */
export function italic(text: string): string {
  return `_${text}_`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number = 4000): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/** Format an amount with thousands separators and two decimals, e.g. `$1,250.00`. */
export function formatPrice(amount: number, currencySymbol: string = '$'): string {
  const formatted = amount.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return `${currencySymbol}${formatted}`;
}
