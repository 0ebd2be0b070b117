/**
 * @ace/roles - Generator
 *
 * Answers a question using the current playbook. Reads the playbook, never
 * mutates it.
 */

import { Type } from '@sinclair/typebox';
import { pino, type Logger } from 'pino';
import type { CompletionClient, CompletionOptions } from '@ace/models';
import { renderPlaybook, type PlaybookView } from '@ace/playbook';
import { buildGeneratorPrompt } from './prompts.js';
import { checkSchema, completeStructured, type ParseOutcome } from './structured.js';

const defaultLog = pino({ name: 'ace:roles:generator' });

const ScalarSchema = Type.Union([Type.String(), Type.Number()]);

const GeneratorPayloadSchema = Type.Object({
  reasoning: Type.String(),
  final_answer: ScalarSchema,
  bullet_ids: Type.Optional(Type.Array(ScalarSchema)),
});

export interface GeneratorOutput {
  reasoning: string;
  finalAnswer: string;
  /** Ids the model says it used, as given (may name unknown bullets). */
  bulletIds: string[];
  raw: Record<string, unknown>;
}

export interface GenerateParams {
  question: string;
  context?: string | null;
  playbook: PlaybookView;
  /** Prior reflection(s), serialized, for retry or refinement. */
  reflection?: string | null;
}

export interface RoleOptions {
  /** Completions attempted per call when output is malformed (default 3). */
  maxRetries?: number;
  completion?: Pick<CompletionOptions, 'temperature' | 'maxTokens'>;
  logger?: Logger;
}

export function parseGeneratorOutput(data: Record<string, unknown>): ParseOutcome<GeneratorOutput> {
  const checked = checkSchema(GeneratorPayloadSchema, data);
  if (!checked.ok) return checked;
  const payload = checked.value;
  return {
    ok: true,
    value: {
      reasoning: payload.reasoning,
      finalAnswer: String(payload.final_answer),
      bulletIds: (payload.bullet_ids ?? []).map((id) => String(id).trim()).filter((id) => id.length > 0),
      raw: data,
    },
  };
}

export class Generator {
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
   * @throws RoleFailedError (GENERATION_FAILED)
   */
  async generate(params: GenerateParams): Promise<GeneratorOutput> {
    const { system, prompt } = buildGeneratorPrompt({
      question: params.question,
      context: params.context ?? null,
      playbook: renderPlaybook(params.playbook),
      reflection: params.reflection ?? null,
    });

    const { value, attempts } = await completeStructured({
      client: this.client,
      role: 'generator',
      prompt,
      parse: parseGeneratorOutput,
      maxRetries: this.maxRetries,
      options: { ...this.completion, system },
      logger: this.log,
    });

    this.log.debug({ attempts, bulletIds: value.bulletIds }, 'Answer generated');
    return value;
  }
}
