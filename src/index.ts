// src/index.ts
export { DatastoreClient } from './client/DatastoreClient';
export type { DatastoreClientOptions } from './client/DatastoreClient';
export { UnitOfWorkStack } from './client/UnitOfWorkStack';
export type { UnitOfWorkHost } from './client/UnitOfWorkHost';

export { Batch } from './transaction/Batch';
export type { UnitOfWorkKind, UnitOfWorkStatus } from './transaction/Batch';
export { Transaction, isTransaction } from './transaction/Transaction';

export { Key } from './datastore/Key';
export type { KeyProtocol, KeyScope, PathElement } from './datastore/Key';
export { Entity } from './datastore/Entity';
export type { EntityProtocol, Properties, PropertyValue } from './datastore/Entity';
export { deleteMutation, upsertMutation } from './datastore/Mutation';
export type { DeleteMutation, Mutation, UpsertMutation } from './datastore/Mutation';

export type {
  AllocateIdsRequest,
  AllocateIdsResponse,
  BeginTransactionRequest,
  BeginTransactionResponse,
  CommitMode,
  CommitRequest,
  CommitResponse,
  DatastoreApi,
  LookupRequest,
  LookupResponse,
  MutationResult,
  RollbackRequest
} from './rpc/DatastoreApi';

export { Operation } from './operation/Operation';
export type { AnyProtocol, OperationProtocol, OperationsApi } from './operation/Operation';
export { DEFAULT_TYPE_URL_PREFIX, MetadataRegistry } from './operation/MetadataRegistry';
export type { MetadataDecoder } from './operation/MetadataRegistry';

export { loadConfig } from './config/config';
export type { DatastoreConfig } from './config/config';

export {
  ConfigError,
  DatastoreError,
  InvalidKeyError,
  MetadataRegistryError,
  OperationCompleteError,
  UnitOfWorkStateError
} from './utils/errors';
export type { DatastoreErrorCode } from './utils/errors';

export { register as metricsRegister, uowMetrics } from './monitoring/metrics';
export { logger, setLogLevel } from './utils/logger';
export type { LoggerLevel } from './utils/logger';
