import type { RetrievalResult } from '../types/index.js';

export const MODERATION_SYSTEM_PROMPT = `You are a compliance moderation assistant. You decide whether user-submitted content complies with the policies you are given.

Rules:
1. Judge the content only against the listed policies
2. FLAGGED means the content violates at least one listed policy; otherwise APPROVED
3. Cite policies by their bracketed id, and only ids that appear in the list
4. Keep the reason to one or two sentences

Output ONLY a JSON object, no explanations.`;

const RESPONSE_FORMAT = `Respond with JSON of the form:
{"verdict": "APPROVED" | "FLAGGED", "reason": "<short rationale>", "policies_cited": ["<policy id>", ...]}`;

export interface AugmentedPrompt {
  prompt: string;
  /** Ids of the policies that made it into the prompt, in relevance order */
  policyIds: string[];
  droppedPolicies: number;
}

function formatPolicy(id: string, source: string, text: string): string {
  return `[${id}] (${source}) ${text}`;
}

function assemble(content: string, policyLines: string[]): string {
  const policies = policyLines.length > 0 ? policyLines.join('\n') : '(no relevant policies found)';
  return [
    'Content to review:',
    '"""',
    content,
    '"""',
    '',
    'Relevant compliance policies (most relevant first):',
    policies,
    '',
    RESPONSE_FORMAT
  ].join('\n');
}

/**
 * Builds the prompt, keeping the longest relevance-ordered prefix of the
 * retrieved policies that fits within `charBudget`. The content itself is
 * never cut.
 */
export function buildAugmentedPrompt(content: string, retrieved: RetrievalResult, charBudget: number): AugmentedPrompt {
  const lines: string[] = [];
  const policyIds: string[] = [];

  // Each policy line adds its own length plus one newline
  let length = assemble(content, []).length - '(no relevant policies found)'.length - 1;

  for (const { record } of retrieved) {
    const line = formatPolicy(record.id, record.source, record.text);
    if (length + line.length + 1 > charBudget) break;
    lines.push(line);
    policyIds.push(record.id);
    length += line.length + 1;
  }

  return {
    prompt: assemble(content, lines),
    policyIds,
    droppedPolicies: retrieved.length - policyIds.length
  };
}
