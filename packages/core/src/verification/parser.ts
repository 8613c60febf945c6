import { z } from 'zod';
import type { Verdict } from './types.js';

/** Reply shape judges are asked for in JSON mode. */
export const VerdictReplySchema = z.object({
  verified: z.boolean(),
  confidence: z.number().min(0).max(1).nullish(),
  feedback: z.string().default('No feedback'),
  corrections: z.array(z.string()).default([]),
});

/**
 * Parse a judge reply into a Verdict.
 *
 * The whole reply must be one JSON object; text around it, code fences or
 * a missing `verified` flag are rejected rather than repaired.
 */
export function parseVerdictReply(sourceId: string, content: string): Verdict {
  let raw: unknown;
  try {
    raw = JSON.parse(content.trim());
  } catch {
    throw new Error(`Reply is not valid JSON: ${truncate(content.trim(), 80)}`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Reply JSON is not an object');
  }

  const parsed = VerdictReplySchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Reply JSON does not match the verdict shape: ${issues}`);
  }

  const { verified, confidence, feedback, corrections } = parsed.data;
  return {
    sourceId,
    verified,
    ...(confidence != null ? { confidence } : {}),
    feedback,
    corrections,
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
