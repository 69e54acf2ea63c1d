import { MetadataRegistryError } from '../utils/errors';

export const DEFAULT_TYPE_URL_PREFIX = 'types.googleapis.com';

/** Decodes the serialized payload of an `Any`-style metadata field. */
export type MetadataDecoder<T = unknown> = (value: Uint8Array) => T;

/**
 * Maps type URLs to metadata decoders. Owned by whoever decodes operation
 * metadata and passed in explicitly; there is no process-wide instance.
 */
export class MetadataRegistry {
  private decoders = new Map<string, MetadataDecoder>();

  static computeTypeUrl(fullName: string, prefix: string = DEFAULT_TYPE_URL_PREFIX): string {
    return `${prefix}/${fullName}`;
  }

  /** Registering the same decoder twice is a no-op; a different one is a conflict. */
  register(typeUrl: string, decoder: MetadataDecoder): void {
    const existing = this.decoders.get(typeUrl);
    if (existing !== undefined && existing !== decoder) {
      throw new MetadataRegistryError(`Conflict: a different decoder is registered for '${typeUrl}'`);
    }
    this.decoders.set(typeUrl, decoder);
  }

  lookup(typeUrl: string): MetadataDecoder | undefined {
    return this.decoders.get(typeUrl);
  }

  has(typeUrl: string): boolean {
    return this.decoders.has(typeUrl);
  }
}
