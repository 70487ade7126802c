/**
 * Notification Dispatch - Task Envelope
 *
 * Creation, copying and the JSON wire contract for task envelopes. The wire
 * form carries a schema version `v`; decoders refuse versions they do not know.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { JsonValue, TaskEnvelope, TaskPayload, WireMessage } from '../types/interfaces';
import {
  ENVELOPE_CONTENT_TYPE,
  ENVELOPE_SCHEMA_VERSION,
  MAX_ENVELOPE_BYTES,
} from '../types/queue-configs';
import { EnvelopeError } from './errors';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const wireEnvelopeSchema = z.object({
  v: z.literal(ENVELOPE_SCHEMA_VERSION),
  id: z.string().uuid(),
  taskName: z.string().min(1),
  queue: z.string().min(1),
  payload: z.record(jsonValueSchema),
  attempt: z.number().int().nonnegative(),
  maxRetries: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
});

export interface CreateEnvelopeInput<TPayload extends TaskPayload> {
  taskName: string;
  queue: string;
  payload: TPayload;
  maxRetries: number;
  id?: string;
  createdAt?: Date;
}

export function createEnvelope<TPayload extends TaskPayload>(
  input: CreateEnvelopeInput<TPayload>
): TaskEnvelope<TPayload> {
  return Object.freeze({
    id: input.id ?? randomUUID(),
    taskName: input.taskName,
    queue: input.queue,
    payload: Object.freeze({ ...input.payload }),
    attempt: 0,
    maxRetries: input.maxRetries,
    createdAt: input.createdAt ?? new Date(),
  });
}

/**
 * The envelope of the next delivery cycle. Everything but `attempt` is shared.
 */
export function nextAttempt<TPayload extends TaskPayload>(
  envelope: TaskEnvelope<TPayload>
): TaskEnvelope<TPayload> {
  return Object.freeze({ ...envelope, attempt: envelope.attempt + 1 });
}

export function encodeEnvelope(envelope: TaskEnvelope): WireMessage {
  const body = JSON.stringify({
    v: ENVELOPE_SCHEMA_VERSION,
    id: envelope.id,
    taskName: envelope.taskName,
    queue: envelope.queue,
    payload: envelope.payload,
    attempt: envelope.attempt,
    maxRetries: envelope.maxRetries,
    createdAt: envelope.createdAt.toISOString(),
  });

  const size = Buffer.byteLength(body, 'utf8');
  if (size > MAX_ENVELOPE_BYTES) {
    throw new EnvelopeError(
      `Envelope for ${envelope.taskName} is ${size} bytes, limit is ${MAX_ENVELOPE_BYTES}`
    );
  }

  return { body, contentType: ENVELOPE_CONTENT_TYPE };
}

export function decodeEnvelope(message: WireMessage): TaskEnvelope {
  if (message.contentType !== ENVELOPE_CONTENT_TYPE) {
    throw new EnvelopeError(`Unsupported content type: ${message.contentType}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(message.body);
  } catch (error) {
    throw new EnvelopeError('Envelope body is not valid JSON', { cause: error });
  }

  const parsed = wireEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'envelope';
    throw new EnvelopeError(`Invalid envelope (${where}): ${issue.message}`);
  }

  const { v: _version, createdAt, payload, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    payload: Object.freeze(payload),
    createdAt: new Date(createdAt),
  });
}

/**
 * Broker-side identity of one delivery cycle of an envelope.
 */
export function deliveryKey(envelope: TaskEnvelope): string {
  return `${envelope.id}.${envelope.attempt}`;
}
