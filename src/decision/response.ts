import { z } from 'zod';
import { VERDICTS, type Verdict } from '../types/index.js';

/**
 * Extracts a JSON object from model output that may carry markdown fences
 * or prose around it. Returns undefined when nothing parses.
 */
export function extractJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Fall through to fenced / embedded object
  }

  const cleaned = text.replace(/```json\s*/gi, '').replace(/```\s*/g, '');
  const match = cleaned.match(/\{[\s\S]*\}/);
  if (!match) return undefined;

  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}

const verdictSchema = z
  .string()
  .transform(value => value.trim().toUpperCase())
  .refine((value): value is Verdict => VERDICTS.some(v => v === value), {
    message: 'verdict must be APPROVED or FLAGGED'
  });

export const decisionResponseSchema = z.object({
  verdict: verdictSchema,
  reason: z.string().trim().min(1).catch('No reason given'),
  policies_cited: z.array(z.string()).catch([])
});

export interface ParsedDecision {
  verdict: Verdict;
  reason: string;
  policies_cited: string[];
}

export type DecisionParseResult =
  | { valid: true; value: ParsedDecision }
  | { valid: false; issues: string[] };

export function parseDecisionResponse(raw: string): DecisionParseResult {
  const json = extractJSON(raw);
  if (json === undefined) {
    return { valid: false, issues: ['response is not JSON'] };
  }

  const parsed = decisionResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      valid: false,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`)
    };
  }

  return { valid: true, value: parsed.data };
}
