// src/utils/errors.ts

export type DatastoreErrorCode =
  | 'UOW_STATE'
  | 'INVALID_KEY'
  | 'CONFIG'
  | 'METADATA_REGISTRY'
  | 'OPERATION_COMPLETE';

/**
 * Base class for errors raised locally by this library. Errors coming back
 * from the RPC layer are never wrapped in one of these.
 */
export class DatastoreError extends Error {
  readonly code: DatastoreErrorCode;

  constructor(code: DatastoreErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A batch or transaction was used in a state that does not allow the call. */
export class UnitOfWorkStateError extends DatastoreError {
  constructor(message: string) {
    super('UOW_STATE', message);
  }
}

export class InvalidKeyError extends DatastoreError {
  constructor(message: string) {
    super('INVALID_KEY', message);
  }
}

export class ConfigError extends DatastoreError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class MetadataRegistryError extends DatastoreError {
  constructor(message: string) {
    super('METADATA_REGISTRY', message);
  }
}

export class OperationCompleteError extends DatastoreError {
  constructor(name: string) {
    super('OPERATION_COMPLETE', `Operation '${name}' has already completed`);
  }
}
