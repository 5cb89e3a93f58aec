import { describe, it, expect } from 'vitest';
import { buildAugmentedPrompt } from '../../src/decision/prompt.js';
import type { RetrievalResult } from '../../src/types/index.js';
import { policyRecord } from '../helpers/fakes.js';

const retrieved: RetrievalResult = [
  { record: policyRecord('pol_a', [1, 0], { text: 'Negative reviews must not include threats', source: 'scraped' }), score: 0.9 },
  { record: policyRecord('pol_b', [0, 1], { text: 'No profanity or harassment' }), score: 0.4 }
];

describe('buildAugmentedPrompt', () => {
  it('should tag every policy with its id in relevance order', () => {
    const { prompt, policyIds, droppedPolicies } = buildAugmentedPrompt('This service is terrible!', retrieved, 10000);

    expect(policyIds).toEqual(['pol_a', 'pol_b']);
    expect(droppedPolicies).toBe(0);
    expect(prompt).toContain('"""\nThis service is terrible!\n"""');
    expect(prompt).toContain(
      '[pol_a] (scraped) Negative reviews must not include threats\n[pol_b] (static) No profanity or harassment'
    );
  });

  it('should drop the lowest-scoring policies first when over budget', () => {
    const full = buildAugmentedPrompt('This service is terrible!', retrieved, 10000).prompt;
    const secondLine = '[pol_b] (static) No profanity or harassment';

    // Exactly enough room for everything except the last policy line
    const budget = full.length - secondLine.length - 1;
    const truncated = buildAugmentedPrompt('This service is terrible!', retrieved, budget);

    expect(truncated.policyIds).toEqual(['pol_a']);
    expect(truncated.droppedPolicies).toBe(1);
    expect(truncated.prompt.length).toBe(budget);
  });

  it('should keep the whole content even when no policy fits', () => {
    const { prompt, policyIds } = buildAugmentedPrompt('This service is terrible!', retrieved, 10);

    expect(policyIds).toEqual([]);
    expect(prompt).toContain('This service is terrible!');
    expect(prompt).toContain('(no relevant policies found)');
  });

  it('should fit exactly at the budget boundary', () => {
    const full = buildAugmentedPrompt('ok', retrieved, 10000).prompt;
    expect(buildAugmentedPrompt('ok', retrieved, full.length).policyIds).toEqual(['pol_a', 'pol_b']);
    expect(buildAugmentedPrompt('ok', retrieved, full.length - 1).policyIds).toEqual(['pol_a']);
  });
});
