import { z } from 'zod';

export const DEFAULT_MESSAGE_FORMAT = 'application/json';

export const OutboxEnvelopeSchema = z.object({
  id: z.string().min(1),
  correlationId: z.string().min(1),
  topic: z.string().min(1),
  key: z.string().min(1),
  type: z.string().min(1),
  format: z.string().min(1),
  data: z.string(),
  occurredAt: z.date(),
  processedAt: z.date().nullable(),
});

export type OutboxEnvelope = z.infer<typeof OutboxEnvelopeSchema>;

export function isDispatched(envelope: Pick<OutboxEnvelope, 'processedAt'>): boolean {
  return envelope.processedAt !== null;
}
