/**
 * @ace/roles - Reflector
 *
 * Diagnoses one generation against its feedback and tags the bullets the
 * generator used. A pure function of its inputs: whether to run another
 * refinement round is the adaptation driver's decision.
 */

import { Type } from '@sinclair/typebox';
import { pino, type Logger } from 'pino';
import type { CompletionClient } from '@ace/models';
import { isBulletTag, renderExcerpt, type BulletTag, type PlaybookView } from '@ace/playbook';
import type { GeneratorOutput, RoleOptions } from './generator.js';
import { buildReflectorPrompt } from './prompts.js';
import { checkSchema, completeStructured, type ParseOutcome } from './structured.js';

const defaultLog = pino({ name: 'ace:roles:reflector' });

const ReflectorPayloadSchema = Type.Object({
  reasoning: Type.String(),
  error_identification: Type.Optional(Type.String()),
  root_cause_analysis: Type.Optional(Type.String()),
  correct_approach: Type.Optional(Type.String()),
  key_insight: Type.Optional(Type.String()),
  bullet_tags: Type.Optional(
    Type.Array(
      Type.Object({
        id: Type.Union([Type.String(), Type.Number()]),
        tag: Type.String(),
      }),
    ),
  ),
  confidence: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

export interface BulletTagging {
  bulletId: string;
  tag: BulletTag;
}

export interface ReflectorOutput {
  /** The diagnosis. */
  reasoning: string;
  errorIdentification: string;
  rootCauseAnalysis: string;
  correctApproach: string;
  keyInsight: string;
  bulletTags: BulletTagging[];
  confidence?: number;
  raw: Record<string, unknown>;
}

export interface ReflectParams {
  question: string;
  generatorOutput: GeneratorOutput;
  playbook: PlaybookView;
  groundTruth?: string | null;
  feedback: string;
  refinementRound?: number;
  /** Serialized diagnosis from the previous round. */
  priorReflection?: string | null;
}

export function parseReflectorOutput(data: Record<string, unknown>): ParseOutcome<ReflectorOutput> {
  const checked = checkSchema(ReflectorPayloadSchema, data);
  if (!checked.ok) return checked;
  const payload = checked.value;

  const bulletTags: BulletTagging[] = [];
  for (const [i, item] of (payload.bullet_tags ?? []).entries()) {
    const tag = item.tag.trim().toLowerCase();
    if (!isBulletTag(tag)) {
      return { ok: false, error: `/bullet_tags/${i}/tag: unknown tag "${item.tag}"` };
    }
    const bulletId = String(item.id).trim();
    if (!bulletId) return { ok: false, error: `/bullet_tags/${i}/id: empty bullet id` };
    bulletTags.push({ bulletId, tag });
  }

  const output: ReflectorOutput = {
    reasoning: payload.reasoning,
    errorIdentification: payload.error_identification ?? '',
    rootCauseAnalysis: payload.root_cause_analysis ?? '',
    correctApproach: payload.correct_approach ?? '',
    keyInsight: payload.key_insight ?? '',
    bulletTags,
    raw: data,
  };
  if (payload.confidence !== undefined) output.confidence = payload.confidence;
  return { ok: true, value: output };
}

/**
 * JSON form of a reflection, as handed to the curator and to later
 * generator calls.
 */
export function serializeReflection(reflection: ReflectorOutput): string {
  return JSON.stringify(
    {
      reasoning: reflection.reasoning,
      error_identification: reflection.errorIdentification,
      root_cause_analysis: reflection.rootCauseAnalysis,
      correct_approach: reflection.correctApproach,
      key_insight: reflection.keyInsight,
      bullet_tags: reflection.bulletTags.map((t) => ({ id: t.bulletId, tag: t.tag })),
      ...(reflection.confidence !== undefined ? { confidence: reflection.confidence } : {}),
    },
    null,
    2,
  );
}

/**
 * A reflection is low-confidence when it neither tags a bullet nor names a
 * key insight, or when it reports a confidence below `threshold`.
 */
export function isLowConfidence(reflection: ReflectorOutput, threshold: number): boolean {
  if (reflection.bulletTags.length === 0 && !reflection.keyInsight.trim()) return true;
  return reflection.confidence !== undefined && reflection.confidence < threshold;
}

export class Reflector {
  private readonly client: CompletionClient;
  private readonly maxRetries: number;
  private readonly completion: RoleOptions['completion'];
  private readonly log: Logger;

  constructor(client: CompletionClient, options: RoleOptions = {}) {
    this.client = client;
    this.maxRetries = options.maxRetries ?? 3;
    this.completion = options.completion;
    this.log = options.logger ?? defaultLog;
  }

  /**
   * @throws RoleFailedError (REFLECTION_FAILED)
   */
  async reflect(params: ReflectParams): Promise<ReflectorOutput> {
    const refinementRound = params.refinementRound ?? 0;
    const { system, prompt } = buildReflectorPrompt({
      question: params.question,
      reasoning: params.generatorOutput.reasoning,
      prediction: params.generatorOutput.finalAnswer,
      groundTruth: params.groundTruth ?? null,
      feedback: params.feedback,
      excerpt: renderExcerpt(params.playbook, params.generatorOutput.bulletIds),
      refinementRound,
      priorReflection: params.priorReflection ?? null,
    });

    const { value, attempts } = await completeStructured({
      client: this.client,
      role: 'reflector',
      prompt,
      parse: parseReflectorOutput,
      maxRetries: this.maxRetries,
      options: { ...this.completion, system, refinementRound },
      logger: this.log,
    });

    this.log.debug(
      { attempts, refinementRound, tags: value.bulletTags.length, confidence: value.confidence },
      'Reflection produced',
    );
    return value;
  }
}
