import type { UnitOfWorkHost } from '../client/UnitOfWorkHost';
import type { CommitRequest } from '../rpc/DatastoreApi';
import { UnitOfWorkStateError } from '../utils/errors';
import { createTransactionLogger, transactionLogger } from '../utils/logger';
import { Batch } from './Batch';
import type { UnitOfWorkKind } from './Batch';

/**
 * A batch backed by a server-side transaction.
 *
 * `begin()` obtains a transaction id, `commit()` sends the mutations in
 * TRANSACTIONAL mode and `rollback()` abandons the transaction on the
 * server. Once committed or rolled back the instance is tombstoned and
 * cannot be begun again.
 */
export class Transaction extends Batch {
  override readonly kind: UnitOfWorkKind = 'transaction';

  private _id: string | null = null;

  constructor(client: UnitOfWorkHost) {
    super(client, transactionLogger);
  }

  /** Set only while IN_PROGRESS. */
  override get id(): string | null {
    return this._id;
  }

  /**
   * The innermost transaction on the owning client, or null when none is
   * active or a plain batch sits on top of the stack.
   */
  override current(): Transaction | null {
    return this.client.currentTransaction;
  }

  override async begin(): Promise<void> {
    if (this._status === 'IN_PROGRESS') {
      throw new UnitOfWorkStateError('Transaction already begun');
    }
    if (this._status !== 'INITIAL') {
      throw new UnitOfWorkStateError(
        `Transaction is tombstoned (${this._status.toLowerCase()}) and cannot be begun again`
      );
    }

    // On failure nothing changes, so begin() may be retried
    const response = await this.client.api.beginTransaction({ projectId: this.project });

    this._id = response.transaction;
    this.log = createTransactionLogger(response.transaction);
    this.markBegun();
  }

  override async commit(): Promise<void> {
    this.requireId('commit');
    await super.commit();
    this._id = null;
  }

  /** Issues the rollback RPC; the transaction is tombstoned even if that call fails. */
  override async rollback(): Promise<void> {
    const transaction = this.requireId('roll back');
    try {
      await this.client.api.rollback({ projectId: this.project, transaction });
    } finally {
      this._id = null;
      this.markAborted();
    }
  }

  protected override buildCommitRequest(): CommitRequest {
    return {
      ...super.buildCommitRequest(),
      mode: 'TRANSACTIONAL',
      transaction: this.requireId('commit')
    };
  }

  protected override get label(): string {
    return 'Transaction';
  }

  private requireId(operation: string): string {
    if (this._id === null) {
      throw new UnitOfWorkStateError(`Cannot ${operation}: no transaction is in progress`);
    }
    return this._id;
  }
}

export function isTransaction(batch: Batch): batch is Transaction {
  return batch.kind === 'transaction';
}
