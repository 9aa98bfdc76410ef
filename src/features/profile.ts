import { logger } from '../middleware/logger.js';
import type { ProfileField } from '../utils/db-types.js';
import { TERMINAL, type ConversationDefinition, type StateRuleSpec } from '../core/conversation-types.js';
import { reply } from '../core/outbound-action.js';
import { payloadString } from '../core/session.js';
import { validateFreeText, validatePhone } from './validators.js';

export const MAX_PROFILE_LOCATION_LENGTH = 100;
export const MAX_BIO_LENGTH = 500;

const PROFILE_FIELDS: readonly ProfileField[] = ['phone', 'location', 'bio'];

const FIELD_LABELS: Record<ProfileField, string> = {
  phone: 'phone number',
  location: 'location',
  bio: 'bio',
};

function profileState(field: ProfileField, spec: Pick<StateRuleSpec, 'prompt' | 'validate'>): StateRuleSpec {
  return {
    state: field,
    ...spec,
    next: () => TERMINAL,
    terminal: {
      type: 'commit',
      async run(payload, ctx) {
        const principalId = ctx.principal.id;
        const value = payloadString(payload, field);
        if (value === undefined) throw new Error(`Profile edit is missing "${field}"`);
        await ctx.store.updateUserProfile(principalId, field, value);
        logger.info({ principalId, field }, 'Profile updated');
        return [reply(principalId, `✅ Your ${FIELD_LABELS[field]} was updated.`, 'success')];
      },
    },
  };
}

export const profileEdit: ConversationDefinition = {
  kind: 'profile-edit',
  initialState: 'phone',
  trigger: { selections: [{ tag: 'edit_profile', arity: [1] }] },
  states: [
    profileState('phone', {
      prompt: () => ({ text: '📞 Send your phone number.' }),
      validate: (input) => validatePhone(input),
    }),
    profileState('location', {
      prompt: () => ({ text: `📍 Send your location (up to ${MAX_PROFILE_LOCATION_LENGTH} characters).` }),
      validate: (input) => validateFreeText(input, 'location', { max: MAX_PROFILE_LOCATION_LENGTH }),
    }),
    profileState('bio', {
      prompt: () => ({ text: `📝 Tell buyers about yourself (up to ${MAX_BIO_LENGTH} characters).` }),
      validate: (input) => validateFreeText(input, 'bio', { max: MAX_BIO_LENGTH }),
    }),
  ],
  async start(signal) {
    const field = PROFILE_FIELDS.find((candidate) => candidate === signal.params[0]?.toLowerCase());
    if (!field) return { ok: false, error: 'That profile field cannot be edited.' };
    return { ok: true, value: { state: field, payload: {} } };
  },
};
