/**
 * @ace/roles - Curator
 *
 * Turns a reflection into a DeltaBatch. The batch is trimmed to the
 * context budget before it is returned: ADDs beyond `maxNewBullets`, and
 * ADD/UPDATE content beyond `maxNewTokens`, are dropped in order.
 */

import { pino, type Logger } from 'pino';
import { estimateTokens, type ContextBudgetConfig } from '@ace/core';
import type { CompletionClient } from '@ace/models';
import {
  parseDeltaBatch,
  proposedContent,
  renderPlaybook,
  type DeltaBatch,
  type DeltaOperation,
  type PlaybookView,
} from '@ace/playbook';
import type { RoleOptions } from './generator.js';
import { buildCuratorPrompt } from './prompts.js';
import { serializeReflection, type ReflectorOutput } from './reflector.js';
import { completeStructured, type ParseOutcome } from './structured.js';

const defaultLog = pino({ name: 'ace:roles:curator' });

export type ContextBudget = ContextBudgetConfig;

export interface DroppedOperation {
  /** Position in the batch as the model proposed it. */
  index: number;
  operation: DeltaOperation;
  reason: 'bullet_budget' | 'token_budget';
}

export interface CuratorOutput {
  batch: DeltaBatch;
  raw: Record<string, unknown>;
  dropped: DroppedOperation[];
}

export interface CurateParams {
  reflection: ReflectorOutput;
  playbook: PlaybookView;
  contextBudget: ContextBudget;
  /** Question, context, metadata, feedback and ground truth of the sample. */
  questionContext: string;
  /** e.g. `epoch 1/2 · sample 3/10` */
  progress: string;
}

interface ParsedCuration {
  batch: DeltaBatch;
  raw: Record<string, unknown>;
}

function parseCuration(data: Record<string, unknown>): ParseOutcome<ParsedCuration> {
  const parsed = parseDeltaBatch(data);
  return parsed.ok ? { ok: true, value: { batch: parsed.batch, raw: data } } : parsed;
}

/**
 * Keep operations, in order, while they fit the budget.
 */
export function applyContextBudget(
  batch: DeltaBatch,
  budget: ContextBudget,
): { batch: DeltaBatch; dropped: DroppedOperation[] } {
  const kept: DeltaOperation[] = [];
  const dropped: DroppedOperation[] = [];
  let newBullets = 0;
  let newTokens = 0;

  batch.operations.forEach((operation, index) => {
    const content = proposedContent(operation);
    if (content === null) {
      kept.push(operation);
      return;
    }
    if (operation.type === 'ADD' && newBullets >= budget.maxNewBullets) {
      dropped.push({ index, operation, reason: 'bullet_budget' });
      return;
    }
    const tokens = estimateTokens(content);
    if (newTokens + tokens > budget.maxNewTokens) {
      dropped.push({ index, operation, reason: 'token_budget' });
      return;
    }
    if (operation.type === 'ADD') newBullets += 1;
    newTokens += tokens;
    kept.push(operation);
  });

  return { batch: { ...batch, operations: kept }, dropped };
}

export class Curator {
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
   * @throws RoleFailedError (CURATION_FAILED)
   */
  async curate(params: CurateParams): Promise<CuratorOutput> {
    const { system, prompt } = buildCuratorPrompt({
      progress: params.progress,
      stats: JSON.stringify(params.playbook.stats()),
      reflection: serializeReflection(params.reflection),
      playbook: renderPlaybook(params.playbook),
      questionContext: params.questionContext,
      maxNewBullets: params.contextBudget.maxNewBullets,
      maxNewTokens: params.contextBudget.maxNewTokens,
    });

    const { value, attempts } = await completeStructured({
      client: this.client,
      role: 'curator',
      prompt,
      parse: parseCuration,
      maxRetries: this.maxRetries,
      options: { ...this.completion, system },
      logger: this.log,
    });

    const { batch, dropped } = applyContextBudget(value.batch, params.contextBudget);
    if (dropped.length > 0) {
      this.log.warn(
        { dropped: dropped.length, reasons: dropped.map((d) => d.reason) },
        'Curator proposal exceeded the context budget',
      );
    }
    this.log.debug({ attempts, operations: batch.operations.length }, 'Delta batch curated');

    return { batch, raw: value.raw, dropped };
  }
}
