/**
 * Namespaced storage keys.
 *
 * A key is a namespace, an entry name inside it and, for per-entity records,
 * the entity id. Encoded form: `<namespace>_<name>` or `<namespace>_<name>:<id>`.
 * Namespaces contain no `_` and names no `:`, so the namespace ends at the
 * first `_`, the name at the first `:`, and ids may contain anything.
 */

export type StorageNamespace = 'gov' | 'oracle';

export interface StorageKey {
  readonly namespace: StorageNamespace;
  readonly name: string;
  readonly id?: string;
}

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

const key = (namespace: StorageNamespace, name: string, id?: string | number): StorageKey => {
  if (!NAME_PATTERN.test(name)) {
    throw new Error(`Invalid storage key name '${name}'.`);
  }
  return id === undefined ? { namespace, name } : { namespace, name, id: String(id) };
};

export const encodeKey = (storageKey: StorageKey): string => {
  const base = `${storageKey.namespace}_${storageKey.name}`;
  return storageKey.id === undefined ? base : `${base}:${storageKey.id}`;
};

export const GovKeys = {
  counter: (): StorageKey => key('gov', 'counter'),
  proposals: (): StorageKey => key('gov', 'proposals'),
  receipts: (proposalId: number): StorageKey => key('gov', 'receipts', proposalId),
  quorumBps: (): StorageKey => key('gov', 'quorum_bps'),
  timelock: (): StorageKey => key('gov', 'timelock'),
  delegation: (delegator: string): StorageKey => key('gov', 'delegation', delegator),
};

export const OracleKeys = {
  sources: (asset: string): StorageKey => key('oracle', 'sources', asset),
  heartbeatTtl: (): StorageKey => key('oracle', 'heartbeat_ttl'),
  mode: (): StorageKey => key('oracle', 'mode'),
  perfCount: (): StorageKey => key('oracle', 'perf_count'),
};
