import type { Logger } from 'pino';
import type { UnitOfWorkHost } from '../client/UnitOfWorkHost';
import type { Entity } from '../datastore/Entity';
import type { Key, PathElement } from '../datastore/Key';
import { deleteMutation, upsertMutation } from '../datastore/Mutation';
import type { Mutation } from '../datastore/Mutation';
import type { CommitRequest, CommitResponse } from '../rpc/DatastoreApi';
import { uowMetrics } from '../monitoring/metrics';
import { InvalidKeyError, UnitOfWorkStateError } from '../utils/errors';
import { batchLogger, createTimer } from '../utils/logger';

export type UnitOfWorkKind = 'batch' | 'transaction';

export type UnitOfWorkStatus = 'INITIAL' | 'IN_PROGRESS' | 'ABORTED' | 'COMMITTED';

/** An entity staged with a partial key, and that key as it was when staged. */
interface PendingKey {
  entity: Entity;
  key: Key;
}

/**
 * Buffers puts and deletes and sends them as one non-transactional commit.
 *
 * Use `run()` for scoped use: the batch is begun and pushed on the client's
 * stack, so that `client.put()`/`client.delete()` stage onto it, and it is
 * committed (or discarded on error) and popped when the callback settles.
 */
export class Batch {
  readonly kind: UnitOfWorkKind = 'batch';

  protected _status: UnitOfWorkStatus = 'INITIAL';
  private _mutations: Mutation[] = [];
  private pendingKeys: PendingKey[] = [];

  constructor(
    protected readonly client: UnitOfWorkHost,
    protected log: Logger = batchLogger
  ) {}

  get project(): string {
    return this.client.project;
  }

  get namespace(): string | undefined {
    return this.client.namespace;
  }

  get status(): UnitOfWorkStatus {
    return this._status;
  }

  /** Server transaction id; a plain batch never has one. */
  get id(): string | null {
    return null;
  }

  get mutations(): readonly Mutation[] {
    return this._mutations;
  }

  /** Entities staged with a partial key, in the order their mutations were staged. */
  get partialKeyEntities(): readonly Entity[] {
    return this.pendingKeys.map(pending => pending.entity);
  }

  /** The innermost unit of work on the owning client. */
  current(): Batch | null {
    return this.client.currentBatch;
  }

  put(entity: Entity): void {
    this.assertStaging('put');

    if (entity.key.project !== this.project) {
      throw new InvalidKeyError(
        `Key project '${entity.key.project}' does not match ${this.kind} project '${this.project}'`
      );
    }

    this._mutations.push(upsertMutation(entity));
    if (entity.key.isPartial) {
      this.pendingKeys.push({ entity, key: entity.key });
    }

    uowMetrics.mutationsStaged.inc({ op: 'upsert' });
    this.log.debug({
      uow: this,
      key: entity.key.toString(),
      partial: entity.key.isPartial,
      action: 'put'
    }, 'Staged upsert');
  }

  delete(key: Key): void {
    this.assertStaging('delete');

    if (key.isPartial) {
      throw new InvalidKeyError(`Cannot delete partial key ${key.toString()}`);
    }
    if (key.project !== this.project) {
      throw new InvalidKeyError(
        `Key project '${key.project}' does not match ${this.kind} project '${this.project}'`
      );
    }

    this._mutations.push(deleteMutation(key));

    uowMetrics.mutationsStaged.inc({ op: 'delete' });
    this.log.debug({ uow: this, key: key.toString(), action: 'delete' }, 'Staged delete');
  }

  async begin(): Promise<void> {
    if (this._status !== 'INITIAL') {
      throw new UnitOfWorkStateError('Batch already started previously');
    }
    this.markBegun();
  }

  /**
   * Sends the buffered mutations in one commit RPC. A transport error
   * leaves status and buffers untouched.
   */
  async commit(): Promise<void> {
    if (this._status !== 'IN_PROGRESS') {
      throw new UnitOfWorkStateError(
        `${this.label} must be in progress to commit (status: ${this._status})`
      );
    }

    const request = this.buildCommitRequest();
    this.log.debug({
      uow: this,
      mode: request.mode,
      action: 'commit_start'
    }, 'Starting commit');

    const timer = createTimer('commit', this.log);
    const response = await this.client.api.commit(request);
    const durationMs = timer.end({ mode: request.mode });
    uowMetrics.commitDuration.observe({ mode: request.mode }, durationMs / 1000);

    const patched = this.applyAssignedKeys(response);

    this._status = 'COMMITTED';
    this.clearBuffers();

    uowMetrics.committed.inc({ kind: this.kind });
    this.log.info({
      uow: this,
      mutationCount: request.mutations.length,
      keysAssigned: patched,
      indexUpdates: response.indexUpdates,
      durationMs,
      action: 'commit_complete'
    }, `${this.label} committed`);
  }

  /** Discards the staged mutations. A plain batch has nothing to undo on the server. */
  async rollback(): Promise<void> {
    if (this._status !== 'IN_PROGRESS') {
      throw new UnitOfWorkStateError(
        `${this.label} must be in progress to roll back (status: ${this._status})`
      );
    }
    this.markAborted();
  }

  /**
   * Runs `work` with this unit of work begun and current on the client.
   * Commits when `work` resolves; rolls back and rethrows when it fails.
   * The stack entry is popped on every path. `work` must pop whatever it
   * pushes: finding another unit of work on top raises UnitOfWorkStateError.
   */
  async run<T>(work: (uow: this) => Promise<T> | T): Promise<T> {
    await this.begin();
    this.client.pushBatch(this);
    try {
      const result = await this.attempt(work);
      await this.commit();
      return result;
    } finally {
      const popped = this.client.popBatch();
      if (popped !== this) {
        this.log.error({ uow: this, action: 'pop_mismatch' }, 'Popped a different unit of work than was pushed');
        throw new UnitOfWorkStateError(`${this.label} run popped a different unit of work than it pushed`);
      }
    }
  }

  protected buildCommitRequest(): CommitRequest {
    return {
      projectId: this.project,
      mode: 'NON_TRANSACTIONAL',
      mutations: [...this._mutations]
    };
  }

  protected get label(): string {
    return 'Batch';
  }

  protected markBegun(): void {
    this._status = 'IN_PROGRESS';
    uowMetrics.begun.inc({ kind: this.kind });
    this.log.info({ uow: this, action: 'begin' }, `${this.label} started`);
  }

  protected markAborted(): void {
    const discarded = this._mutations.length;
    this._status = 'ABORTED';
    this.clearBuffers();

    uowMetrics.rolledBack.inc({ kind: this.kind });
    this.log.info({
      uow: this,
      mutationsDiscarded: discarded,
      action: 'rollback'
    }, `${this.label} rolled back`);
  }

  private assertStaging(operation: string): void {
    if (this._status === 'COMMITTED' || this._status === 'ABORTED') {
      throw new UnitOfWorkStateError(
        `Cannot ${operation} on a ${this._status.toLowerCase()} ${this.kind}`
      );
    }
  }

  /**
   * The server returns one keyed result per partial-key upsert, in staging
   * order. Pair them positionally with the pending entities.
   */
  private applyAssignedKeys(response: CommitResponse): number {
    const assigned = response.mutationResults.flatMap(result => (result.key ? [result.key] : []));

    if (assigned.length !== this.pendingKeys.length) {
      this.log.warn({
        uow: this,
        assignedKeys: assigned.length,
        partialKeyEntities: this.pendingKeys.length,
        action: 'key_count_mismatch'
      }, 'Commit returned a different number of keys than partial keys staged');
    }

    let patched = 0;
    const count = Math.min(assigned.length, this.pendingKeys.length);
    for (let i = 0; i < count; i++) {
      const { entity, key } = this.pendingKeys[i];
      const path = assigned[i].path;
      const identifier = identifierOf(path[path.length - 1]);

      if (identifier === null) {
        this.log.warn({ uow: this, position: i, action: 'incomplete_assigned_key' }, 'Commit returned an incomplete key');
        continue;
      }

      entity.key = key.completeKey(identifier);
      patched++;
    }

    uowMetrics.keysPatched.inc(patched);
    return patched;
  }

  private clearBuffers(): void {
    this._mutations = [];
    this.pendingKeys = [];
  }

  private async attempt<T>(work: (uow: this) => Promise<T> | T): Promise<T> {
    try {
      return await work(this);
    } catch (error) {
      await this.abandon(error);
      throw error;
    }
  }

  // A rollback failure is logged; the caller sees the error that aborted the work.
  private async abandon(cause: unknown): Promise<void> {
    this.log.warn({ uow: this, err: cause, action: 'abandon' }, `${this.label} failed, rolling back`);
    try {
      await this.rollback();
    } catch (rollbackError) {
      this.log.error({
        uow: this,
        err: rollbackError,
        action: 'rollback_failed'
      }, 'Rollback after a failed unit of work also failed');
    }
  }
}

function identifierOf(element: PathElement | undefined): { id: string } | { name: string } | null {
  if (element?.id !== undefined) return { id: element.id };
  if (element?.name !== undefined) return { name: element.name };
  return null;
}
