import type { Logger } from 'pino';
import { loadConfig } from '../config/config';
import { Entity } from '../datastore/Entity';
import { Key } from '../datastore/Key';
import type { KeyProtocol } from '../datastore/Key';
import type { DatastoreApi } from '../rpc/DatastoreApi';
import { Batch } from '../transaction/Batch';
import { Transaction } from '../transaction/Transaction';
import { InvalidKeyError } from '../utils/errors';
import { clientLogger } from '../utils/logger';
import type { UnitOfWorkHost } from './UnitOfWorkHost';
import { UnitOfWorkStack } from './UnitOfWorkStack';

export interface DatastoreClientOptions {
  api: DatastoreApi;
  /** Falls back to DATASTORE_PROJECT_ID. */
  projectId?: string;
  /** Falls back to DATASTORE_NAMESPACE. */
  namespace?: string;
  env?: NodeJS.ProcessEnv;
}

export class DatastoreClient implements UnitOfWorkHost {
  public readonly project: string;
  public readonly namespace?: string;
  public readonly api: DatastoreApi;

  private readonly stack = new UnitOfWorkStack();
  private log: Logger = clientLogger;

  constructor(options: DatastoreClientOptions) {
    const config = loadConfig(options.env, {
      projectId: options.projectId,
      namespace: options.namespace
    });

    this.project = config.projectId;
    this.namespace = config.namespace;
    this.api = options.api;
    this.log = clientLogger.child({ project: this.project });
  }

  // Unit-of-work stack

  pushBatch(batch: Batch): void {
    this.stack.push(batch);
    this.log.debug({ uow: batch, depth: this.stack.depth, action: 'push' }, 'Unit of work pushed');
  }

  popBatch(): Batch | null {
    const popped = this.stack.pop();
    this.log.debug({ uow: popped ?? undefined, depth: this.stack.depth, action: 'pop' }, 'Unit of work popped');
    return popped;
  }

  get currentBatch(): Batch | null {
    return this.stack.peek();
  }

  get currentTransaction(): Transaction | null {
    return this.stack.peekTransaction();
  }

  get stackDepth(): number {
    return this.stack.depth;
  }

  // Factories

  batch(): Batch {
    return new Batch(this);
  }

  transaction(): Transaction {
    return new Transaction(this);
  }

  key(...flatPath: Array<string | number>): Key {
    return Key.fromFlatPath(flatPath, { project: this.project, namespace: this.namespace });
  }

  runInBatch<T>(work: (batch: Batch) => Promise<T> | T): Promise<T> {
    return this.batch().run(work);
  }

  runInTransaction<T>(work: (transaction: Transaction) => Promise<T> | T): Promise<T> {
    return this.transaction().run(work);
  }

  // Writes

  async put(entity: Entity): Promise<void> {
    await this.putMulti([entity]);
  }

  /**
   * Stages on the current unit of work. With none active, the entities are
   * written right away through a one-off batch.
   */
  async putMulti(entities: Entity[]): Promise<void> {
    if (entities.length === 0) return;

    const current = this.currentBatch;
    if (current) {
      entities.forEach(entity => current.put(entity));
      return;
    }

    const batch = this.batch();
    await batch.begin();
    entities.forEach(entity => batch.put(entity));
    await batch.commit();
  }

  async delete(key: Key): Promise<void> {
    await this.deleteMulti([key]);
  }

  async deleteMulti(keys: Key[]): Promise<void> {
    if (keys.length === 0) return;

    const current = this.currentBatch;
    if (current) {
      keys.forEach(key => current.delete(key));
      return;
    }

    const batch = this.batch();
    await batch.begin();
    keys.forEach(key => batch.delete(key));
    await batch.commit();
  }

  // Reads

  async get(key: Key): Promise<Entity | null> {
    const [entity] = await this.getMulti([key]);
    return entity;
  }

  /**
   * Looks up `keys`, reading inside the current transaction when there is
   * one. Results line up with `keys`; missing entities come back as null.
   */
  async getMulti(keys: Key[]): Promise<Array<Entity | null>> {
    if (keys.length === 0) return [];

    const transaction = this.currentTransaction?.id ?? undefined;
    const found = new Map<string, Entity>();
    let pending: KeyProtocol[] = keys.map(key => key.toProtocol());
    let rounds = 0;

    while (pending.length > 0) {
      const response = await this.api.lookup({ projectId: this.project, keys: pending, transaction });
      rounds++;

      for (const protocol of response.found) {
        const entity = Entity.fromProtocol(protocol);
        found.set(entity.key.toString(), entity);
      }
      pending = response.deferred;
    }

    this.log.debug({
      requested: keys.length,
      found: found.size,
      rounds,
      transaction,
      action: 'lookup'
    }, 'Lookup completed');

    return keys.map(key => found.get(key.toString()) ?? null);
  }

  /** Reserves `count` ids for the kind of a partial key. */
  async allocateIds(incompleteKey: Key, count: number): Promise<Key[]> {
    if (!incompleteKey.isPartial) {
      throw new InvalidKeyError('Key for allocateIds must be partial');
    }
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Cannot allocate ${count} ids`);
    }
    if (count === 0) return [];

    const protocol = incompleteKey.toProtocol();
    const response = await this.api.allocateIds({
      projectId: this.project,
      keys: Array.from({ length: count }, () => protocol)
    });

    return response.keys.map(key => Key.fromProtocol(key));
  }
}
