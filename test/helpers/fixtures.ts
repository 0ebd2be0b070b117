/**
 * Shared test helpers: deterministic clocks and scripted role replies.
 */
/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = '2025-01-01T00:00:00.000Z'): () => Date {
  let t = new Date(start).getTime();
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}

/** Clock frozen at a single instant. */
export function fixedClock(at = '2025-01-01T00:00:00.000Z'): () => Date {
  return () => new Date(at);
}

export function generatorReply(finalAnswer: string, bulletIds: string[] = [], reasoning = 'worked it out'): string {
  return JSON.stringify({ reasoning, bullet_ids: bulletIds, final_answer: finalAnswer });
}

export function reflectorReply(fields: {
  reasoning?: string;
  keyInsight?: string;
  tags?: Array<{ id: string; tag: string }>;
  confidence?: number;
} = {}): string {
  return JSON.stringify({
    reasoning: fields.reasoning ?? 'diagnosis',
    error_identification: '',
    root_cause_analysis: '',
    correct_approach: '',
    key_insight: fields.keyInsight ?? 'keep it simple',
    bullet_tags: fields.tags ?? [],
    ...(fields.confidence !== undefined ? { confidence: fields.confidence } : {}),
  });
}

export function curatorReply(operations: Array<Record<string, unknown>>, reasoning = 'curated'): string {
  return JSON.stringify({ reasoning, operations });
}
