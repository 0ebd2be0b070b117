/**
 * @ace/playbook - Delta operations
 *
 * A DeltaBatch is the ordered list of edits one Curator call proposes.
 * Later operations may reference bullets created by earlier ADDs in the
 * same batch. `parseDeltaBatch` turns the curator's JSON payload
 * ({ reasoning, operations: [{ type, section, content, bullet_id, metadata }] })
 * into typed operations.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { isBulletTag, type BulletCounters, type BulletTag } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AddOperation {
  type: 'ADD';
  section: string;
  content: string;
  counters?: Partial<BulletCounters>;
  metadata?: Record<string, unknown>;
}

export interface UpdateOperation {
  type: 'UPDATE';
  bulletId: string;
  content?: string;
}

export interface TagOperation {
  type: 'TAG';
  bulletId: string;
  tag: BulletTag;
  /** Defaults to 1. */
  amount?: number;
}

export interface RemoveOperation {
  type: 'REMOVE';
  bulletId: string;
}

export type DeltaOperation = AddOperation | UpdateOperation | TagOperation | RemoveOperation;

export type DeltaOperationType = DeltaOperation['type'];

export interface DeltaBatch {
  /** Assigned by the merger when absent; used by the merge journal. */
  id?: string;
  reasoning?: string;
  operations: DeltaOperation[];
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export const Delta = {
  add(
    section: string,
    content: string,
    counters?: Partial<BulletCounters>,
    metadata?: Record<string, unknown>,
  ): AddOperation {
    return {
      type: 'ADD',
      section,
      content,
      ...(counters ? { counters } : {}),
      ...(metadata ? { metadata } : {}),
    };
  },
  update(bulletId: string, content?: string): UpdateOperation {
    return content === undefined ? { type: 'UPDATE', bulletId } : { type: 'UPDATE', bulletId, content };
  },
  tag(bulletId: string, tag: BulletTag, amount = 1): TagOperation {
    return { type: 'TAG', bulletId, tag, amount };
  },
  remove(bulletId: string): RemoveOperation {
    return { type: 'REMOVE', bulletId };
  },
  batch(operations: DeltaOperation[], reasoning?: string): DeltaBatch {
    return reasoning === undefined ? { operations } : { operations, reasoning };
  },
};

/**
 * Content-bearing operations whose text counts against a curator budget.
 */
export function proposedContent(op: DeltaOperation): string | null {
  if (op.type === 'ADD') return op.content;
  if (op.type === 'UPDATE') return op.content ?? null;
  return null;
}

/** Every bullet id an operation names explicitly. */
export function referencedId(op: DeltaOperation): string | null {
  return op.type === 'ADD' ? null : op.bulletId;
}

// ---------------------------------------------------------------------------
// Wire format
// ---------------------------------------------------------------------------

const RawOperationSchema = Type.Object({
  type: Type.String(),
  section: Type.Optional(Type.String()),
  content: Type.Optional(Type.String()),
  bullet_id: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  tag: Type.Optional(Type.String()),
  amount: Type.Optional(Type.Number()),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const RawDeltaBatchSchema = Type.Object({
  reasoning: Type.Optional(Type.String()),
  operations: Type.Array(RawOperationSchema),
});

type RawOperation = Static<typeof RawOperationSchema>;

export type DeltaParseResult =
  | { ok: true; batch: DeltaBatch }
  | { ok: false; error: string };

const COUNTER_KEYS = ['helpful', 'harmful', 'neutral'] as const;
const COUNTER_KEY_SET: ReadonlySet<string> = new Set(COUNTER_KEYS);

function splitMetadata(metadata: Record<string, unknown> | undefined): {
  counters: Partial<BulletCounters>;
  rest: Record<string, unknown>;
} {
  const counters: Partial<BulletCounters> = {};
  const rest: Record<string, unknown> = {};
  for (const key of COUNTER_KEYS) {
    const value = metadata?.[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      counters[key] = Math.floor(value);
    }
  }
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (!COUNTER_KEY_SET.has(key)) rest[key] = value;
  }
  return { counters, rest };
}

function convertOperation(raw: RawOperation, index: number): DeltaOperation[] | string {
  const type = raw.type.trim().toUpperCase();
  const bulletId = raw.bullet_id === undefined ? '' : String(raw.bullet_id).trim();
  const needsId = (): string | null =>
    bulletId.length > 0 ? null : `operations[${index}]: ${type} requires bullet_id`;

  switch (type) {
    case 'ADD': {
      const section = raw.section?.trim() ?? '';
      const content = raw.content?.trim() ?? '';
      if (!section) return `operations[${index}]: ADD requires a section`;
      if (!content) return `operations[${index}]: ADD requires content`;
      const { counters, rest } = splitMetadata(raw.metadata);
      return [
        Delta.add(
          section,
          content,
          Object.keys(counters).length > 0 ? counters : undefined,
          Object.keys(rest).length > 0 ? rest : undefined,
        ),
      ];
    }
    case 'UPDATE': {
      const missing = needsId();
      if (missing) return missing;
      const content = raw.content?.trim();
      return [Delta.update(bulletId, content ? content : undefined)];
    }
    case 'TAG': {
      const missing = needsId();
      if (missing) return missing;
      if (raw.tag !== undefined) {
        const tag = raw.tag.trim().toLowerCase();
        if (!isBulletTag(tag)) return `operations[${index}]: unknown tag "${raw.tag}"`;
        return [Delta.tag(bulletId, tag, raw.amount ?? 1)];
      }
      const { counters } = splitMetadata(raw.metadata);
      const ops = COUNTER_KEYS.flatMap((key) => {
        const amount = counters[key];
        return amount !== undefined ? [Delta.tag(bulletId, key, amount)] : [];
      });
      return ops.length > 0 ? ops : `operations[${index}]: TAG requires a tag or positive counts`;
    }
    case 'REMOVE': {
      const missing = needsId();
      if (missing) return missing;
      return [Delta.remove(bulletId)];
    }
    default:
      return `operations[${index}]: unknown operation type "${raw.type}"`;
  }
}

/**
 * Validate and convert a curator payload. Any malformed operation fails the
 * whole parse so the caller can ask the model again.
 */
export function parseDeltaBatch(data: unknown): DeltaParseResult {
  if (!Value.Check(RawDeltaBatchSchema, data)) {
    const first = Value.Errors(RawDeltaBatchSchema, data).First();
    return {
      ok: false,
      error: first ? `${first.path || '/'}: ${first.message}` : 'invalid delta batch',
    };
  }

  const operations: DeltaOperation[] = [];
  for (let i = 0; i < data.operations.length; i++) {
    const raw = data.operations[i];
    if (!raw) continue;
    const converted = convertOperation(raw, i);
    if (typeof converted === 'string') return { ok: false, error: converted };
    operations.push(...converted);
  }

  return {
    ok: true,
    batch: data.reasoning === undefined ? { operations } : { operations, reasoning: data.reasoning },
  };
}
