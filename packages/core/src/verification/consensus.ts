import { z } from 'zod';
import { textSimilarity } from '../similarity/jaccard.js';
import { InvalidInputError } from './errors.js';
import type {
  CandidateResponse,
  ConsensusAnalysis,
  ConsensusSummary,
  SimilarityPair,
} from './types.js';

/**
 * Compare independently generated answers to the same query.
 * Pure computation; no judge is called.
 */
export function analyzeConsensus(responses: readonly CandidateResponse[]): ConsensusAnalysis {
  if (responses.length === 0) {
    throw new InvalidInputError('no responses');
  }

  const ids = responses.map((r, i) => r.id ?? `model_${i}`);
  const similarities: SimilarityPair[] = [];
  for (let i = 0; i < responses.length; i++) {
    for (let j = i + 1; j < responses.length; j++) {
      similarities.push({
        sourceA: ids[i],
        sourceB: ids[j],
        similarity: textSimilarity(responses[i].text, responses[j].text),
      });
    }
  }

  return {
    summary: summarizeConsensus(responses),
    similarities,
    responses: [...responses],
  };
}

export function summarizeConsensus(responses: readonly CandidateResponse[]): ConsensusSummary {
  if (responses.length === 0) {
    throw new InvalidInputError('no responses');
  }
  const verifiedCount = responses.filter(r => r.verified).length;
  return {
    totalResponses: responses.length,
    verifiedCount,
    consensusRatio: verifiedCount / responses.length,
    // strict majority
    recommendation: verifiedCount > responses.length / 2 ? 'USE_WITH_CONFIDENCE' : 'VERIFY_FURTHER',
  };
}

// ---------------------------------------------------------------------------
// Input parsing
// ---------------------------------------------------------------------------

const CandidateEntrySchema = z.union([
  z.object({
    id: z.string().optional(),
    text: z.string(),
    verified: z.boolean().optional(),
  }),
  z.object({
    model: z.string().optional(),
    response: z.string(),
    verified: z.boolean().optional(),
  }),
]);

const CandidateListSchema = z.array(CandidateEntrySchema);

/**
 * Read candidate responses from JSON. Each entry is either
 * `{ id?, text, verified? }` or `{ model?, response, verified? }`;
 * a missing `verified` counts as false.
 */
export function parseCandidateResponses(json: string): CandidateResponse[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new InvalidInputError('responses file is not valid JSON');
  }

  const parsed = CandidateListSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new InvalidInputError(`invalid responses: ${issues}`);
  }

  return parsed.data.map((entry): CandidateResponse => {
    if ('text' in entry) {
      return { ...(entry.id !== undefined ? { id: entry.id } : {}), text: entry.text, verified: entry.verified ?? false };
    }
    return { ...(entry.model !== undefined ? { id: entry.model } : {}), text: entry.response, verified: entry.verified ?? false };
  });
}
