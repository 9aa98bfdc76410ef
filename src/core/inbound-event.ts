import type { ListingPhoto, UserProfileHint } from '../utils/db-types.js';

/**
 * Normalized inbound event.
 *
 * Transport bindings map their native updates into this shape; the engine
 * never sees platform SDK types.
 */
export type UserInput =
  | { type: 'text'; text: string }
  /** Structured action tag, optionally with `:`-delimited parameters. */
  | { type: 'selection'; data: string }
  | { type: 'media'; media: ListingPhoto };

export interface InboundEvent {
  principalId: number;
  input: UserInput;
  /** Display fields the transport knows about the sender, if any. */
  profile?: UserProfileHint;
}

/** Lower-cased text or selection data, used for keyword matching. */
export function inputKeyword(input: UserInput): string | null {
  if (input.type === 'text') return input.text.trim().toLowerCase();
  if (input.type === 'selection') return input.data.trim().toLowerCase();
  return null;
}
