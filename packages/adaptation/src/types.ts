/**
 * @ace/adaptation - Shared types
 */

import type { AceErrorCode } from '@ace/core';
import type { MergeReport, PlaybookView } from '@ace/playbook';
import type { CuratorOutput, GeneratorOutput, ReflectorOutput } from '@ace/roles';

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

/** One task instance presented to the adaptation loop. */
export interface Sample {
  question: string;
  context?: string;
  groundTruth?: string | null;
  metadata?: Record<string, unknown>;
}

/** Feedback from evaluating a generator answer. */
export interface EnvironmentResult {
  feedback: string;
  groundTruth?: string | null;
  metrics?: Record<string, number>;
}

/**
 * The task-evaluation capability: an opaque scoring oracle.
 */
export interface TaskEnvironment {
  evaluate(
    sample: Sample,
    generatorOutput: GeneratorOutput,
  ): EnvironmentResult | Promise<EnvironmentResult>;
}

// ---------------------------------------------------------------------------
// Step results
// ---------------------------------------------------------------------------

export const ADAPTATION_STAGES = ['GENERATE', 'EVALUATE', 'REFLECT', 'CURATE', 'MERGE'] as const;

export type AdaptationStage = (typeof ADAPTATION_STAGES)[number];

export interface StepPosition {
  epoch: number;
  totalEpochs: number;
  /** 1-based. */
  step: number;
  totalSteps: number;
}

export interface CompletedStep {
  status: 'completed';
  stepId: string;
  sample: Sample;
  position: StepPosition;
  generatorOutput: GeneratorOutput;
  environmentResult: EnvironmentResult;
  reflection: ReflectorOutput;
  /** Reflector invocations, including refinement rounds. */
  reflectionRounds: number;
  curatorOutput: CuratorOutput;
  mergeReport: MergeReport;
  /** Rendered playbook as of this step's merge. */
  playbookSnapshot: string;
}

export type StepErrorCode = AceErrorCode | 'UNEXPECTED_ERROR';

export interface FailedStep {
  status: 'failed';
  stepId: string;
  sample: Sample;
  position: StepPosition;
  stage: AdaptationStage;
  error: { code: StepErrorCode; message: string };
  generatorOutput?: GeneratorOutput;
  environmentResult?: EnvironmentResult;
  reflection?: ReflectorOutput;
}

export type StepResult = CompletedStep | FailedStep;

export interface AdaptationRun {
  results: StepResult[];
  playbook: PlaybookView;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface StageEvent {
  stepId: string;
  stage: AdaptationStage;
  position: StepPosition;
}

export interface EpochEvent {
  epoch: number;
  totalEpochs: number;
}

export interface EpochEndEvent extends EpochEvent {
  completed: number;
  failed: number;
}

/** Payload of each event an adapter emits. */
export interface AdapterEvents {
  stage: StageEvent;
  step: StepResult;
  'epoch:start': EpochEvent;
  'epoch:end': EpochEndEvent;
}
