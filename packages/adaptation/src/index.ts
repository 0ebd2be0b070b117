/**
 * @ace/adaptation - Offline and online adaptation drivers
 */

export {
  ADAPTATION_STAGES,
  type AdaptationRun,
  type AdaptationStage,
  type AdapterEvents,
  type CompletedStep,
  type EnvironmentResult,
  type EpochEndEvent,
  type EpochEvent,
  type FailedStep,
  type Sample,
  type StageEvent,
  type StepErrorCode,
  type StepPosition,
  type StepResult,
  type TaskEnvironment,
} from './types.js';

export { AdapterBase, formatProgress, formatQuestionContext, type AdapterOptions } from './adapter.js';
export { OfflineAdapter, type OfflineAdapterOptions } from './offline.js';
export { OnlineAdapter, type OnlineStep } from './online.js';
