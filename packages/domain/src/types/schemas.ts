import { z } from 'zod';
import { PermanentError } from '../errors.js';
import { TranscriptStatus } from './enums.js';
import type { WorkItem, TranscriptResult } from './entities.js';

export const WORK_ITEM = z
  .object({
    job_id: z.string().min(1),
    object_key: z.string().min(1),
    reference: z.string().url(),
    enqueued_at: z.string().datetime({ offset: true }),
    validity_window_seconds: z.number().int().positive(),
  })
  .strict();

export const TRANSCRIPT_RESULT = z.object({
  job_id: z.string().min(1),
  object_key: z.string(),
  reference: z.string(),
  text: z.string(),
  status: z.nativeEnum(TranscriptStatus),
  error_detail: z.string().optional(),
});

export function serializeWorkItem(item: WorkItem): string {
  return JSON.stringify(item);
}

/**
 * Deserialize a queue message body. Anything that is not a well-formed work
 * item is a permanent failure: redelivering it cannot fix it.
 */
export function parseWorkItem(body: string): WorkItem {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new PermanentError(`Message body is not valid JSON: ${body.slice(0, 120)}`, undefined, {
      cause: error,
    });
  }

  const parsed = WORK_ITEM.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PermanentError(`Message body is not a work item: ${issues}`);
  }

  return Object.freeze(parsed.data);
}

export function parseTranscriptResult(raw: unknown): TranscriptResult | null {
  const parsed = TRANSCRIPT_RESULT.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
