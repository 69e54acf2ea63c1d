import type { Entity, Properties } from './Entity';
import type { Key, KeyProtocol } from './Key';

export interface UpsertMutation {
  op: 'upsert';
  key: KeyProtocol;
  properties: Properties;
  excludeFromIndexes: string[];
}

export interface DeleteMutation {
  op: 'delete';
  key: KeyProtocol;
}

/** One staged write. Captured by value, so later edits to the entity do not leak in. */
export type Mutation = UpsertMutation | DeleteMutation;

export function upsertMutation(entity: Entity): UpsertMutation {
  return {
    op: 'upsert',
    key: entity.key.toProtocol(),
    properties: { ...entity.properties },
    excludeFromIndexes: [...entity.excludeFromIndexes]
  };
}

export function deleteMutation(key: Key): DeleteMutation {
  return { op: 'delete', key: key.toProtocol() };
}
