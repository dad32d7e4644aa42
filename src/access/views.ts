import { z } from 'zod';
import { isRecord } from '../utils.js';

export const WILDCARD_DOMAIN = '*';

// Firestore hands back Timestamp objects; fixtures and other stores use Date
// or ISO strings.
const toDate = (value: unknown): unknown => {
  if (typeof value === 'string') {
    return new Date(value);
  }
  if (isRecord(value) && typeof value.toDate === 'function') {
    const converted: unknown = value.toDate();
    return converted;
  }
  return value;
};

const TimestampSchema = z.preprocess(toDate, z.date());

export const ApiKeyRecordSchema = z.object({
  active: z.boolean(),
  allowed_domains: z.array(z.string()).default([]),
  created_at: TimestampSchema.optional(),
  expires_at: TimestampSchema.nullish(),
});

export type ApiKeyRecord = z.infer<typeof ApiKeyRecordSchema>;

export interface AuthorizeOptions {
  signal?: AbortSignal;
}
