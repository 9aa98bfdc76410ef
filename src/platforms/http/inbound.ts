import { z } from 'zod';
import type { InboundEvent } from '../../core/inbound-event.js';
import type { Result } from '../../utils/formatting.js';

/**
 * JSON shape accepted by `POST /events`. Maps one-to-one onto InboundEvent;
 * the engine never sees anything that has not passed this schema.
 */

const principalIdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const inputSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('selection'), data: z.string() }),
  z.object({
    type: z.literal('media'),
    media: z.object({ fileId: z.string().min(1), uniqueId: z.string().min(1) }),
  }),
]);

const profileSchema = z.object({
  username: z.string().max(64).optional(),
  firstName: z.string().max(128).optional(),
  lastName: z.string().max(128).optional(),
});

export const inboundEventSchema = z.object({
  principalId: principalIdSchema,
  input: inputSchema,
  profile: profileSchema.optional(),
});

export function parseInboundEvent(body: unknown): Result<InboundEvent> {
  const parsed = inboundEventSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
    return { ok: false, error: issues.join('; ') };
  }
  return { ok: true, value: parsed.data };
}
