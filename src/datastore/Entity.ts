import { Key } from './Key';
import type { KeyProtocol } from './Key';

export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | Date
  | Uint8Array
  | Key
  | PropertyValue[]
  | { [name: string]: PropertyValue };

export type Properties = Record<string, PropertyValue>;

/** Plain form of an entity as it travels through the RPC layer. */
export interface EntityProtocol {
  key: KeyProtocol;
  properties: Properties;
  excludeFromIndexes?: string[];
}

/**
 * A record in the store. `key` is replaced in place when the server assigns
 * an id to a partial key on commit.
 */
export class Entity<T extends Properties = Properties> {
  public key: Key;
  public properties: T;
  public readonly excludeFromIndexes: Set<string>;

  constructor(key: Key, properties: T, excludeFromIndexes: Iterable<string> = []) {
    this.key = key;
    this.properties = properties;
    this.excludeFromIndexes = new Set(excludeFromIndexes);
  }

  static fromProtocol(protocol: EntityProtocol): Entity {
    return new Entity(
      Key.fromProtocol(protocol.key),
      { ...protocol.properties },
      protocol.excludeFromIndexes ?? []
    );
  }
}
