/**
 * @ace/playbook - Evolving strategy playbook
 *
 * Public API surface:
 *   - Playbook          (playbook.ts)    -- sectioned bullet store
 *   - DeltaMerger       (merger.ts)      -- serialized, transactional mutation
 *   - Delta / parse     (delta.ts)       -- operation types and wire format
 *   - growAndRefine     (maintenance.ts) -- dedup, prune and evict
 *   - Similarity        (similarity.ts)  -- duplicate detection strategies
 *   - Rendering         (render.ts)      -- prompt-ready text
 *   - JSON persistence  (serializer.ts)
 *   - PlaybookDatabase  (database.ts)    -- SQLite persistence + merge journal
 */

// Types
export {
  BULLET_TAGS,
  isBulletTag,
  zeroCounters,
  type Bullet,
  type BulletCounters,
  type BulletTag,
  type PlaybookStats,
  type PlaybookView,
} from './types.js';

// Store
export {
  Playbook,
  type PlaybookCheckpoint,
  type PlaybookOptions,
  type PlaybookState,
} from './playbook.js';

// Deltas
export {
  Delta,
  parseDeltaBatch,
  proposedContent,
  referencedId,
  RawDeltaBatchSchema,
  type AddOperation,
  type DeltaBatch,
  type DeltaOperation,
  type DeltaOperationType,
  type DeltaParseResult,
  type RemoveOperation,
  type TagOperation,
  type UpdateOperation,
} from './delta.js';

// Merging
export {
  AsyncMutex,
  DeltaMerger,
  type DeltaMergerOptions,
  type MergeAnomaly,
  type MergeAnomalyReason,
  type MergeJournal,
  type MergeReport,
  type OperationOutcome,
  type PlaybookStorage,
} from './merger.js';

// Maintenance
export {
  growAndRefine,
  isPruneCandidate,
  type MaintenanceOptions,
  type MaintenanceReport,
} from './maintenance.js';

// Similarity
export {
  createSimilarity,
  normalizeText,
  tokenize,
  NormalizedTextSimilarity,
  TokenOverlapSimilarity,
  type SimilarityStrategy,
} from './similarity.js';

// Rendering
export { renderBullet, renderExcerpt, renderPlaybook } from './render.js';

// Persistence
export {
  dumps,
  loads,
  toDocument,
  fromDocument,
  saveToFile,
  loadFromFile,
  JsonPlaybookFile,
  PlaybookDocumentSchema,
  PLAYBOOK_FORMAT_VERSION,
  type PlaybookDocument,
} from './serializer.js';
export { PlaybookDatabase, type MergeLogEntry } from './database.js';
