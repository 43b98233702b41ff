import { AsyncLocalStorage } from 'node:async_hooks';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { encodeKey, StorageKey } from './storageKeys.js';

/** Key-value view handed to store helpers. Writes land in the draft only. */
export interface KvDraft {
  get(key: StorageKey): unknown;
  set(key: StorageKey, value: unknown): void;
  delete(key: StorageKey): void;
}

class MapDraft implements KvDraft {
  private dirty = false;

  constructor(readonly entries: Map<string, unknown>) {}

  get changed(): boolean {
    return this.dirty;
  }

  get(key: StorageKey): unknown {
    return this.entries.get(encodeKey(key));
  }

  set(key: StorageKey, value: unknown): void {
    this.entries.set(encodeKey(key), value);
    this.dirty = true;
  }

  delete(key: StorageKey): void {
    if (this.entries.delete(encodeKey(key))) {
      this.dirty = true;
    }
  }
}

const BIGINT_TAG = '$bigint';

const encodeBigInts = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? { [BIGINT_TAG]: value.toString() } : value
);

const decodeBigInts = (_key: string, value: unknown): unknown => {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
  const fields = Object.entries(value);
  if (fields.length !== 1) return value;
  const [tag, raw] = fields[0];
  return tag === BIGINT_TAG && typeof raw === 'string' && /^-?\d+$/.test(raw) ? BigInt(raw) : value;
};

const stateFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), z.unknown()),
});

export const serializeEntries = (entries: Map<string, unknown>): string => JSON.stringify(
  { version: 1, entries: Object.fromEntries(entries) },
  encodeBigInts,
  2,
);

export const deserializeEntries = (raw: string): Map<string, unknown> => {
  const parsed = stateFileSchema.safeParse(JSON.parse(raw, decodeBigInts));
  if (!parsed.success) {
    throw new DomainError(ErrorCode.StateCorrupted, 500, 'State file has an unexpected shape.', {
      issues: parsed.error.flatten(),
    });
  }
  return new Map(Object.entries(parsed.data.entries));
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

/**
 * Process-wide key-value store.
 *
 * Invocations are serialized through a single lock. Each one works on a deep
 * copy of the committed entries; the copy replaces the committed entries only
 * after the work resolves and (when a state file is configured) has been
 * written. A transaction opened from inside another transaction's async
 * context is refused, since it would otherwise wait on its own lock.
 */
export class KvStore {
  private entries: Map<string, unknown> = new Map();
  private lock: Promise<void> = Promise.resolve();
  private readonly context = new AsyncLocalStorage<true>();

  constructor(private readonly stateFilePath?: string) {}

  async init(): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.entries = deserializeEntries(raw);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.entries = new Map();
      await this.persist(this.entries);
    }
  }

  /** Detached copy of committed state. */
  snapshot(): KvDraft {
    return new MapDraft(structuredClone(this.entries));
  }

  keyCount(): number {
    return this.entries.size;
  }

  inTransaction(): boolean {
    return this.context.getStore() === true;
  }

  async transaction<T>(work: (draft: KvDraft) => Promise<T> | T): Promise<T> {
    if (this.inTransaction()) {
      throw new DomainError(
        ErrorCode.Reentrancy,
        409,
        'Re-entrant invocation refused while another invocation is in progress.',
      );
    }

    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = new MapDraft(structuredClone(this.entries));
      const result = await this.context.run(true, () => work(draft));
      if (draft.changed) {
        await this.persist(draft.entries);
        this.entries = draft.entries;
      }
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.entries);
  }

  private async persist(entries: Map<string, unknown>): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.writeFile(this.stateFilePath, serializeEntries(entries));
  }
}

/**
 * Read and validate a stored value. Absent keys yield undefined; a value that
 * does not match the schema means the state was written by something else.
 */
export const readValue = <T>(
  draft: KvDraft,
  key: StorageKey,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined => {
  const raw = draft.get(key);
  if (raw === undefined) return undefined;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DomainError(ErrorCode.StateCorrupted, 500, `Stored value for '${encodeKey(key)}' is invalid.`, {
      issues: parsed.error.flatten(),
    });
  }
  return parsed.data;
};
