import type { EntityProtocol } from '../datastore/Entity';
import type { KeyProtocol } from '../datastore/Key';
import type { Mutation } from '../datastore/Mutation';

export type CommitMode = 'NON_TRANSACTIONAL' | 'TRANSACTIONAL';

export interface BeginTransactionRequest {
  projectId: string;
}

export interface BeginTransactionResponse {
  transaction: string;
}

export interface CommitRequest {
  projectId: string;
  mode: CommitMode;
  mutations: Mutation[];
  transaction?: string;
}

/** Only results of upserts whose key was partial carry a `key`. */
export interface MutationResult {
  key?: KeyProtocol;
}

export interface CommitResponse {
  mutationResults: MutationResult[];
  indexUpdates?: number;
}

export interface RollbackRequest {
  projectId: string;
  transaction: string;
}

export interface LookupRequest {
  projectId: string;
  keys: KeyProtocol[];
  transaction?: string;
}

export interface LookupResponse {
  found: EntityProtocol[];
  missing: KeyProtocol[];
  deferred: KeyProtocol[];
}

export interface AllocateIdsRequest {
  projectId: string;
  keys: KeyProtocol[];
}

export interface AllocateIdsResponse {
  keys: KeyProtocol[];
}

/**
 * RPC surface of the remote store. Transport, encoding and retries live
 * behind this interface; errors it rejects with are passed on unchanged.
 */
export interface DatastoreApi {
  beginTransaction(request: BeginTransactionRequest): Promise<BeginTransactionResponse>;
  commit(request: CommitRequest): Promise<CommitResponse>;
  rollback(request: RollbackRequest): Promise<void>;
  lookup(request: LookupRequest): Promise<LookupResponse>;
  allocateIds(request: AllocateIdsRequest): Promise<AllocateIdsResponse>;
}
