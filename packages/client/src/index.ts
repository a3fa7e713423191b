/**
 * @chronokv/client: client access layer for a time-versioned record store.
 */

// Facade
export { ChronoClient, type ConnectOptions } from './client.js';

// Types
export type {
  AccessToken,
  TransactionToken,
  TransactionState,
  WireType,
  TObject,
  Value,
  QueryResult,
  OperationFamily,
  SessionOperation,
  ParamSlot,
  OperationDescriptor,
} from './types.js';
export type {
  TimeArgument,
  GetArgs,
  SelectArgs,
  AuditArgs,
  AddArgs,
  SetArgs,
  CallArguments,
  ResolvedTime,
  ResolvedValues,
  ResolvedCall,
} from './args/types.js';

// Errors
export {
  ChronoKvError,
  MissingRequiredArgumentsError,
  AmbiguousArgumentsError,
  InvalidArgumentsError,
  UnsupportedShapeError,
  IllegalStateTransitionError,
  TransactionConflictError,
  TransportFailureError,
  AuthenticationFailureError,
  RemoteOperationError,
  toChronoKvError,
  parseRemoteError,
  type ErrorCode,
} from './errors.js';

// Resolution and dispatch
export { resolveCall, shapeOf, REQUIRED_ARGUMENTS } from './args/resolver.js';
export {
  REGISTERED_SHAPES,
  SLOT_ORDER,
  buildShapeTag,
  isRegisteredShape,
  type ShapeTagOf,
  type ReadShape,
  type AuditShape,
  type WriteShape,
} from './dispatch/shapes.js';
export {
  OPERATION_DISPATCH_TABLE,
  SESSION_DESCRIPTORS,
  REMOTE_METHOD_NAMES,
  lookupDescriptor,
  findDescriptorByName,
} from './dispatch/table.js';
export { DispatchExecutor, type DispatchExecutorOptions } from './dispatch/executor.js';
export { TransactionContext, type TransactionBackend } from './transaction/context.js';

// Values
export { Link, Tag } from './codec/values.js';
export { JsonValueCodec, decodeResult, isTObject, type ValueCodec } from './codec/value-codec.js';
export { isAccessToken, isTransactionToken } from './tokens.js';

// Transport
export type { Transport, RemoteOperationInvoker, SessionHandshake, WireParam } from './transport/types.js';
export { HttpTransport, type HttpTransportOptions } from './transport/http.js';

// Config and logging
export {
  loadClientConfig,
  readPrefsFile,
  readEnvOverrides,
  clientConfigSchema,
  DEFAULT_CLIENT_CONFIG,
  ConfigValidationError,
  type ClientConfig,
  type ConfigIssue,
  type LoadClientConfigOptions,
} from './config/loader.js';
export { createLogger, type Logger } from './logger.js';
