import type { DatastoreApi } from '../rpc/DatastoreApi';
import type { Batch } from '../transaction/Batch';
import type { Transaction } from '../transaction/Transaction';

/**
 * What a batch or transaction needs from the client that owns it: the
 * store scope, the RPC surface and the client's unit-of-work stack.
 */
export interface UnitOfWorkHost {
  readonly project: string;
  readonly namespace?: string;
  readonly api: DatastoreApi;

  pushBatch(batch: Batch): void;
  popBatch(): Batch | null;
  readonly currentBatch: Batch | null;
  readonly currentTransaction: Transaction | null;
}
