import { OperationCompleteError } from '../utils/errors';
import { operationLogger } from '../utils/logger';
import type { MetadataRegistry } from './MetadataRegistry';

export interface AnyProtocol {
  typeUrl: string;
  value: Uint8Array;
}

export interface OperationProtocol {
  name: string;
  done?: boolean;
  metadata?: AnyProtocol;
}

/** Anything that can fetch the current state of an operation by name. */
export interface OperationsApi {
  getOperation(request: { name: string }): Promise<OperationProtocol>;
}

/**
 * Handle on a long-running server operation. Polling is explicit: each
 * `finished()` call makes one request.
 *
 * `metadata` is null, not an empty object, when none was given or its type
 * URL has no registered decoder.
 */
export class Operation<TMetadata = unknown> {
  /** Resource the operation acts on; set by callers. */
  public target: unknown = null;

  private _complete = false;

  constructor(
    public readonly name: string,
    public readonly client: OperationsApi,
    public readonly metadata: TMetadata | null = null
  ) {}

  /**
   * Builds an operation from its wire form, decoding metadata when the
   * registry knows its type URL. Unknown metadata types are left undecoded.
   */
  static fromProtocol(
    op: OperationProtocol,
    client: OperationsApi,
    registry: MetadataRegistry
  ): Operation {
    let metadata: unknown = null;
    if (op.metadata?.typeUrl) {
      const decode = registry.lookup(op.metadata.typeUrl);
      if (decode) {
        metadata = decode(op.metadata.value);
      } else {
        operationLogger.debug({ name: op.name, typeUrl: op.metadata.typeUrl }, 'No decoder for operation metadata');
      }
    }
    return new Operation(op.name, client, metadata);
  }

  get complete(): boolean {
    return this._complete;
  }

  async finished(): Promise<boolean> {
    if (this._complete) {
      throw new OperationCompleteError(this.name);
    }

    const operation = await this.client.getOperation({ name: this.name });
    if (operation.done) {
      this._complete = true;
      operationLogger.info({ name: this.name, action: 'operation_done' }, 'Operation completed');
    }

    return this._complete;
  }
}
