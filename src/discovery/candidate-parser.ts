/**
 * Validates backend output against the candidate contract.
 *
 * The payload is the text between the first `[` and the last `]`.
 * Validation is all-or-nothing: one invalid element makes the whole
 * response malformed.
 */

import { z } from 'zod';
import { MalformedResponseError } from '../errors.js';
import { truncateText } from '../sessions/text-sanitizer.js';
import type { DiscoveryPrompt, PatternCandidate } from './types.js';

export const SNIPPET_CHARS = 400;
export const GUIDANCE_CHARS = 180;
export const KEYWORD_CHARS = 40;
export const EXAMPLE_CHARS = 240;
export const MAX_GUIDANCE = 3;
export const MAX_KEYWORDS = 6;
export const MAX_CANDIDATE_EXAMPLES = 3;

const nonEmpty = z.string().trim().min(1);

export const CandidateSchema = z.object({
  title: nonEmpty,
  description: z.string().trim(),
  guidance: z.array(nonEmpty).min(1),
  keywords: z.array(nonEmpty).min(1),
  examples: z.array(nonEmpty).min(1),
  novelty: z.number().int().min(1).max(10).optional(),
});

export const CandidateArraySchema = z.array(CandidateSchema);

function malformed(reason: string, raw: string): MalformedResponseError {
  return new MalformedResponseError(`Malformed discovery response: ${reason}`, raw.slice(0, SNIPPET_CHARS));
}

/**
 * Parse and post-process raw backend output.
 *
 * @throws {MalformedResponseError} when no array is found, it is not JSON,
 *   an element fails the schema, or a dynamic-mode element lacks novelty
 */
export function parseCandidates(raw: string, prompt: DiscoveryPrompt): PatternCandidate[] {
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start === -1 || end <= start) {
    throw malformed('no JSON array found', raw);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw.slice(start, end + 1));
  } catch {
    throw malformed('array is not valid JSON', raw);
  }

  const result = CandidateArraySchema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw malformed(`${issue?.path.join('.') ?? '<root>'}: ${issue?.message ?? 'invalid'}`, raw);
  }

  if (prompt.mode === 'dynamic') {
    const missing = result.data.findIndex((candidate) => candidate.novelty === undefined);
    if (missing !== -1) {
      throw malformed(`${missing}.novelty: required in dynamic mode`, raw);
    }
  }

  const seen = new Set(prompt.knownTitles.map((title) => title.toLowerCase()));
  const candidates: PatternCandidate[] = [];
  for (const candidate of result.data) {
    const key = candidate.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);

    candidates.push({
      title: candidate.title,
      description: candidate.description,
      guidance: candidate.guidance.slice(0, MAX_GUIDANCE).map((line) => truncateText(line, GUIDANCE_CHARS)),
      keywords: [...new Set(candidate.keywords.map((k) => truncateText(k.toLowerCase(), KEYWORD_CHARS)))]
        .slice(0, MAX_KEYWORDS),
      examples: candidate.examples.slice(0, MAX_CANDIDATE_EXAMPLES).map((quote) => truncateText(quote, EXAMPLE_CHARS)),
      ...(candidate.novelty === undefined ? {} : { novelty: candidate.novelty }),
    });
    if (candidates.length === prompt.capacity) break;
  }
  return candidates;
}
