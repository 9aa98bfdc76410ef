/**
 * Input sanitization. Every inbound input passes through here before the
 * conversation engine sees it.
 *
 * 1. Control character stripping: null bytes, zero-width chars, RTL overrides
 * 2. Length limits on text and selection data
 * 3. Selection data restricted to the `tag:param` alphabet
 */

import { logger } from './logger.js';
import type { UserInput } from '../core/inbound-event.js';
import type { Result } from '../utils/formatting.js';

// ── Constants ───────────────────────────────────────────────────────

/** Maximum text input length we'll process (chars). */
export const MAX_INPUT_LENGTH = 4096;

/** Maximum selection data length. Chat platforms cap callback data at 64 bytes. */
export const MAX_SELECTION_LENGTH = 64;

/** Maximum length of a media file identifier. */
export const MAX_MEDIA_ID_LENGTH = 256;

const SELECTION_PATTERN = /^[a-z0-9_]+(:[a-z0-9_.-]*)*$/i;

// ── Control character stripping ─────────────────────────────────────

/**
 * Strip dangerous control characters from user input.
 * Removes: null bytes, zero-width spaces/joiners, RTL/LTR overrides,
 * paragraph separators, and other invisible Unicode.
 */
export function stripControlChars(text: string): string {
  return text
    // Null bytes
    .replace(/\0/g, '')
    // Zero-width characters (U+200B-U+200F, U+FEFF)
    .replace(/[\u200B-\u200F\uFEFF]/g, '')
    // Directional overrides (U+202A-U+202E, U+2066-U+2069)
    .replace(/[\u202A-\u202E\u2066-\u2069]/g, '')
    // Paragraph/line separators that could break formatting
    .replace(/[\u2028\u2029]/g, '\n')
    .trim();
}

// ── Length enforcement ──────────────────────────────────────────────

/**
 * Check if a text input exceeds length limits. Returns null if OK,
 * or a rejection reason if too long.
 */
export function checkInputLength(text: string): string | null {
  if (text.length > MAX_INPUT_LENGTH) {
    logger.warn({ length: text.length, max: MAX_INPUT_LENGTH }, 'Input exceeds length limit');
    return `Message too long (${text.length} chars, max ${MAX_INPUT_LENGTH}). Please shorten it.`;
  }
  return null;
}

// ── Combined sanitization pipeline ──────────────────────────────────

/**
 * Run the full sanitization pipeline on an inbound input.
 * Returns the cleaned input or a reason to reject it outright.
 */
export function sanitizeInput(input: UserInput): Result<UserInput> {
  switch (input.type) {
    case 'text': {
      const text = stripControlChars(input.text);
      const lengthError = checkInputLength(text);
      if (lengthError) return { ok: false, error: lengthError };
      return { ok: true, value: { type: 'text', text } };
    }
    case 'selection': {
      const data = stripControlChars(input.data);
      if (data.length === 0 || data.length > MAX_SELECTION_LENGTH || !SELECTION_PATTERN.test(data)) {
        logger.warn({ preview: data.slice(0, MAX_SELECTION_LENGTH) }, 'Malformed selection data rejected');
        return { ok: false, error: 'That action is not recognised.' };
      }
      return { ok: true, value: { type: 'selection', data } };
    }
    case 'media': {
      const fileId = stripControlChars(input.media.fileId);
      const uniqueId = stripControlChars(input.media.uniqueId);
      if (!fileId || !uniqueId || fileId.length > MAX_MEDIA_ID_LENGTH || uniqueId.length > MAX_MEDIA_ID_LENGTH) {
        return { ok: false, error: 'That file could not be read. Please send it again.' };
      }
      return { ok: true, value: { type: 'media', media: { fileId, uniqueId } } };
    }
  }
}
