import type { Result } from '../utils/formatting.js';
import type { EngineSettings } from '../core/conversation-types.js';
import type { UserInput } from '../core/inbound-event.js';
import { parseIdParam, parseSelection } from '../core/selection.js';
import { findCategory } from './catalog.js';

/**
 * Input validators shared by every conversation. Each returns the cleaned
 * value or a user-facing error message.
 */

/** Text content of a text input; selections and media have none. */
export function textOf(input: UserInput): string | null {
  return input.type === 'text' ? input.text : null;
}

export function validateTitle(input: UserInput, settings: EngineSettings): Result<string> {
  const text = textOf(input)?.trim();
  if (!text) return { ok: false, error: 'The title cannot be empty.' };
  if (text.length < settings.minTitleLength) {
    return { ok: false, error: `The title must be at least ${settings.minTitleLength} characters.` };
  }
  if (text.length > settings.maxTitleLength) {
    return { ok: false, error: `The title cannot exceed ${settings.maxTitleLength} characters.` };
  }
  return { ok: true, value: text };
}

export function validateDescription(input: UserInput, settings: EngineSettings): Result<string> {
  const text = textOf(input);
  if (text === null) return { ok: false, error: 'Please send the description as text.' };
  const trimmed = text.trim();
  if (trimmed.length > settings.maxDescriptionLength) {
    return { ok: false, error: `The description cannot exceed ${settings.maxDescriptionLength} characters.` };
  }
  return { ok: true, value: trimmed };
}

/**
 * Parse a price such as "49.99", "$1,250" or "1 000". Rounded to cents and
 * bounded by the configured range.
 */
export function parsePrice(raw: string, settings: EngineSettings): Result<number> {
  const cleaned = raw.trim().replace(/[$,\s]/g, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return { ok: false, error: 'Please enter a valid number for the price.' };
  }

  const price = Math.round(Number(cleaned) * 100) / 100;
  if (price <= 0) return { ok: false, error: 'The price must be a positive number.' };
  if (price < settings.minPrice) {
    return { ok: false, error: `The price must be at least ${settings.currencySymbol}${settings.minPrice}.` };
  }
  if (price > settings.maxPrice) {
    return { ok: false, error: `The price cannot exceed ${settings.currencySymbol}${settings.maxPrice.toLocaleString('en-US')}.` };
  }
  return { ok: true, value: price };
}

export function validatePrice(input: UserInput, settings: EngineSettings): Result<number> {
  const text = textOf(input);
  if (text === null) return { ok: false, error: 'Please enter a valid number for the price.' };
  return parsePrice(text, settings);
}

/** Accept `category:<id>` selections or a typed category id. */
export function validateCategory(input: UserInput, options: { allowAll?: boolean } = {}): Result<string> {
  let id: string | undefined;
  if (input.type === 'selection') {
    const { tag, params } = parseSelection(input.data);
    if (tag === 'category' && params.length === 1) id = params[0]?.toLowerCase();
  } else if (input.type === 'text') {
    id = input.text.trim().toLowerCase();
  }

  if (id === 'all' && options.allowAll) return { ok: true, value: 'all' };
  if (id && findCategory(id)) return { ok: true, value: id };
  return { ok: false, error: 'Please choose one of the listed categories.' };
}

/** Accept a numeric id typed as text or picked as `<tag>:<id>`. */
export function validateId(input: UserInput, label: string): Result<number> {
  let raw: string | undefined;
  if (input.type === 'text') raw = input.text.trim().replace(/^#/, '');
  if (input.type === 'selection') raw = parseSelection(input.data).params[0];
  const id = parseIdParam(raw);
  return id === null ? { ok: false, error: `Please send a valid ${label} id (a positive number).` } : { ok: true, value: id };
}

export function validateFreeText(
  input: UserInput,
  field: string,
  bounds: { min?: number; max: number },
): Result<string> {
  const text = textOf(input)?.trim() ?? '';
  const min = bounds.min ?? 1;
  if (text.length < min) {
    return { ok: false, error: min > 1 ? `The ${field} must be at least ${min} characters.` : `The ${field} cannot be empty.` };
  }
  if (text.length > bounds.max) {
    return { ok: false, error: `The ${field} cannot exceed ${bounds.max} characters.` };
  }
  return { ok: true, value: text };
}

export function validatePhone(input: UserInput): Result<string> {
  const text = textOf(input)?.trim() ?? '';
  if (!/^[+\d\s()-]{5,20}$/.test(text) || !/\d{3,}/.test(text.replace(/\D/g, ''))) {
    return { ok: false, error: 'Please send a phone number using digits, spaces, +, - or parentheses.' };
  }
  return { ok: true, value: text };
}

/** "yes"/"no" from text or a `confirm:yes` / `confirm:no` selection. */
export function validateConfirmation(input: UserInput): Result<boolean> {
  let answer: string | undefined;
  if (input.type === 'text') answer = input.text.trim().toLowerCase();
  if (input.type === 'selection') {
    const { tag, params } = parseSelection(input.data);
    answer = tag === 'confirm' ? params[0]?.toLowerCase() : tag;
  }
  if (answer === 'yes' || answer === 'y') return { ok: true, value: true };
  if (answer === 'no' || answer === 'n') return { ok: true, value: false };
  return { ok: false, error: 'Please answer yes or no.' };
}
