/**
 * Outbound action: what the engine asks the transport to deliver.
 * Rendering and keyboard construction are up to the transport.
 */

export type Tone =
  | 'prompt'
  | 'validation-error'
  | 'notice'
  | 'success'
  | 'results'
  | 'cancelled'
  | 'forbidden'
  | 'error';

export interface SuggestedInput {
  label: string;
  /** Selection data sent back when the suggestion is picked. */
  data: string;
}

export interface OutboundAction {
  principalId: number;
  text: string;
  tone: Tone;
  suggestedInputs: SuggestedInput[];
}

export interface Prompt {
  text: string;
  suggestedInputs?: SuggestedInput[];
}

export function reply(
  principalId: number,
  text: string,
  tone: Tone,
  suggestedInputs: SuggestedInput[] = [],
): OutboundAction {
  return { principalId, text, tone, suggestedInputs };
}

export function promptAction(principalId: number, prompt: Prompt, tone: Tone = 'prompt'): OutboundAction {
  return reply(principalId, prompt.text, tone, prompt.suggestedInputs ?? []);
}

export const CANCEL_SUGGESTION: SuggestedInput = { label: '❌ Cancel', data: 'cancel' };
export const SKIP_SUGGESTION: SuggestedInput = { label: '⏭ Skip', data: 'skip' };
