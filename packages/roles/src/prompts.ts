/**
 * @ace/roles - Prompt builders
 *
 * One builder per role over the shared completion capability. Each returns
 * the system instruction and the user prompt; the JSON shape requested here
 * is the one the role's parser accepts.
 */

export interface RolePrompt {
  system: string;
  prompt: string;
}

export const EMPTY_PLAYBOOK = '(empty playbook)';
const NONE = '(none)';

function orNone(value: string | null | undefined): string {
  return value && value.trim() ? value : NONE;
}

function section(title: string, body: string): string {
  return `## ${title}\n\n${body}`;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

const GENERATOR_SYSTEM = `You are an expert problem solver working from a playbook of strategies.
Apply the relevant bullets, avoid the mistakes they warn about, and reason step by step.
Cite the ids of every bullet you relied on.`;

export interface GeneratorPromptInput {
  question: string;
  context?: string | null;
  /** Rendered playbook; '' when empty. */
  playbook: string;
  reflection?: string | null;
}

export function buildGeneratorPrompt(input: GeneratorPromptInput): RolePrompt {
  const sections = [
    section('PLAYBOOK', input.playbook || EMPTY_PLAYBOOK),
    section('RECENT REFLECTION', orNone(input.reflection)),
    section('QUESTION', input.question),
    section('CONTEXT', orNone(input.context)),
    section(
      'RESPONSE FORMAT',
      `Respond with a single JSON object:
{
  "reasoning": "<step-by-step reasoning>",
  "bullet_ids": ["<id of each bullet used>"],
  "final_answer": "<concise final answer>"
}`,
    ),
  ];
  return { system: GENERATOR_SYSTEM, prompt: sections.join('\n\n') };
}

// ---------------------------------------------------------------------------
// Reflector
// ---------------------------------------------------------------------------

const REFLECTOR_SYSTEM = `You are a senior reviewer diagnosing an attempted solution.
Compare the reasoning and answer with the feedback and ground truth, find what went wrong and why,
and classify every playbook bullet that was consulted as helpful, harmful or neutral for this outcome.
Output a single valid JSON object and nothing else.`;

export interface ReflectorPromptInput {
  question: string;
  reasoning: string;
  prediction: string;
  groundTruth?: string | null;
  feedback: string;
  /** `[id] content` lines of the bullets the generator cited. */
  excerpt: string;
  refinementRound: number;
  priorReflection?: string | null;
}

export function buildReflectorPrompt(input: ReflectorPromptInput): RolePrompt {
  const sections = [
    section('QUESTION', input.question),
    section('MODEL REASONING', orNone(input.reasoning)),
    section('MODEL PREDICTION', orNone(input.prediction)),
    section('GROUND TRUTH', orNone(input.groundTruth)),
    section('FEEDBACK', orNone(input.feedback)),
    section('PLAYBOOK BULLETS CONSULTED', input.excerpt || '(no bullets referenced)'),
  ];

  if (input.refinementRound > 0) {
    sections.push(
      section(
        `REFINEMENT ROUND ${input.refinementRound}`,
        `Your previous diagnosis was not conclusive:\n${orNone(input.priorReflection)}\n\nSharpen it: name a concrete key insight and tag the bullets involved.`,
      ),
    );
  }

  sections.push(
    section(
      'RESPONSE FORMAT',
      `{
  "reasoning": "<analysis>",
  "error_identification": "<what went wrong>",
  "root_cause_analysis": "<why it happened>",
  "correct_approach": "<what should be done instead>",
  "key_insight": "<reusable takeaway>",
  "bullet_tags": [{"id": "<bullet id>", "tag": "helpful|harmful|neutral"}],
  "confidence": <number between 0 and 1>
}`,
    ),
  );
  return { system: REFLECTOR_SYSTEM, prompt: sections.join('\n\n') };
}

// ---------------------------------------------------------------------------
// Curator
// ---------------------------------------------------------------------------

const CURATOR_SYSTEM = `You are the curator of a strategy playbook. Turn the latest reflection into incremental updates.
Only add genuinely new material, prefer updating or tagging existing bullets, and never rewrite the whole playbook.
Output a single valid JSON object and nothing else.`;

export interface CuratorPromptInput {
  progress: string;
  /** JSON-encoded playbook stats. */
  stats: string;
  /** JSON-encoded reflection. */
  reflection: string;
  playbook: string;
  questionContext: string;
  maxNewBullets: number;
  maxNewTokens: number;
}

export function buildCuratorPrompt(input: CuratorPromptInput): RolePrompt {
  const sections = [
    section('PROGRESS', input.progress),
    section('PLAYBOOK STATS', input.stats),
    section('RECENT REFLECTION', input.reflection),
    section('CURRENT PLAYBOOK', input.playbook || EMPTY_PLAYBOOK),
    section('QUESTION CONTEXT', input.questionContext),
    section(
      'BUDGET',
      `Add at most ${input.maxNewBullets} new bullet(s) and about ${input.maxNewTokens} tokens of new or rewritten content.`,
    ),
    section(
      'RESPONSE FORMAT',
      `{
  "reasoning": "<how you decided on the updates>",
  "operations": [
    {
      "type": "ADD|UPDATE|TAG|REMOVE",
      "section": "<section name, for ADD>",
      "content": "<bullet text, for ADD and UPDATE>",
      "bullet_id": "<existing id, for UPDATE, TAG and REMOVE>",
      "metadata": {"helpful": 1}
    }
  ]
}
If no update is needed, return an empty "operations" list.`,
    ),
  ];
  return { system: CURATOR_SYSTEM, prompt: sections.join('\n\n') };
}
