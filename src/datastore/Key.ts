import { InvalidKeyError } from '../utils/errors';

/** One `kind`/identifier pair in a key path. Ids are int64 carried as strings. */
export interface PathElement {
  kind: string;
  id?: string;
  name?: string;
}

/** Plain form of a key as it travels through the RPC layer. */
export interface KeyProtocol {
  partitionId: {
    projectId: string;
    namespaceId?: string;
  };
  path: PathElement[];
}

export interface KeyScope {
  project: string;
  namespace?: string;
}

/**
 * Identity of an entity. The last path element may lack an identifier, in
 * which case the key is partial and the server assigns one on insert.
 */
export class Key {
  public readonly project: string;
  public readonly namespace?: string;
  public readonly path: readonly PathElement[];

  constructor(scope: KeyScope, path: readonly PathElement[]) {
    if (path.length === 0) {
      throw new InvalidKeyError('Key path must not be empty');
    }

    path.forEach((element, index) => {
      if (!element.kind) {
        throw new InvalidKeyError(`Key path element ${index} has no kind`);
      }
      if (element.id !== undefined && element.name !== undefined) {
        throw new InvalidKeyError(`Key path element ${index} has both an id and a name`);
      }
      const complete = element.id !== undefined || element.name !== undefined;
      if (!complete && index < path.length - 1) {
        throw new InvalidKeyError('Only the last key path element may be partial');
      }
    });

    this.project = scope.project;
    this.namespace = scope.namespace;
    this.path = path.map(element => ({ ...element }));
  }

  /**
   * Builds a key from alternating kinds and identifiers, e.g.
   * `['Parent', 'alice', 'Task', 42]`. Numbers become ids, strings names.
   * An odd length leaves the last kind without an identifier.
   */
  static fromFlatPath(flatPath: ReadonlyArray<string | number>, scope: KeyScope): Key {
    const path: PathElement[] = [];

    for (let i = 0; i < flatPath.length; i += 2) {
      const kind = flatPath[i];
      if (typeof kind !== 'string') {
        throw new InvalidKeyError(`Kind at position ${i} must be a string`);
      }

      const element: PathElement = { kind };
      if (i + 1 < flatPath.length) {
        const identifier = flatPath[i + 1];
        if (typeof identifier === 'number') {
          if (!Number.isSafeInteger(identifier) || identifier <= 0) {
            throw new InvalidKeyError(`Id at position ${i + 1} must be a positive integer`);
          }
          element.id = String(identifier);
        } else {
          element.name = identifier;
        }
      }
      path.push(element);
    }

    return new Key(scope, path);
  }

  static fromProtocol(protocol: KeyProtocol): Key {
    return new Key(
      { project: protocol.partitionId.projectId, namespace: protocol.partitionId.namespaceId },
      protocol.path
    );
  }

  private get last(): PathElement {
    return this.path[this.path.length - 1];
  }

  get kind(): string {
    return this.last.kind;
  }

  get id(): string | undefined {
    return this.last.id;
  }

  get name(): string | undefined {
    return this.last.name;
  }

  get isPartial(): boolean {
    return this.id === undefined && this.name === undefined;
  }

  get parent(): Key | null {
    if (this.path.length === 1) return null;
    return new Key(this.scope, this.path.slice(0, -1));
  }

  private get scope(): KeyScope {
    return { project: this.project, namespace: this.namespace };
  }

  /** New key with the server-assigned identifier filled into the last element. */
  completeKey(identifier: { id: string } | { name: string }): Key {
    if (!this.isPartial) {
      throw new InvalidKeyError('Only a partial key can be completed');
    }
    const completed: PathElement = 'id' in identifier
      ? { kind: this.kind, id: identifier.id }
      : { kind: this.kind, name: identifier.name };
    return new Key(this.scope, [...this.path.slice(0, -1), completed]);
  }

  equals(other: Key): boolean {
    if (this.project !== other.project) return false;
    if ((this.namespace ?? '') !== (other.namespace ?? '')) return false;
    if (this.path.length !== other.path.length) return false;
    return this.path.every((element, i) => {
      const theirs = other.path[i];
      return element.kind === theirs.kind && element.id === theirs.id && element.name === theirs.name;
    });
  }

  toProtocol(): KeyProtocol {
    const partitionId: KeyProtocol['partitionId'] = { projectId: this.project };
    if (this.namespace) {
      partitionId.namespaceId = this.namespace;
    }
    return { partitionId, path: this.path.map(element => ({ ...element })) };
  }

  toString(): string {
    const segments = this.path.map(e => `${e.kind}:${e.id ?? e.name ?? '?'}`);
    return `${this.project}/${this.namespace ?? ''}/${segments.join('/')}`;
  }
}
