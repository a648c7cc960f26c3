export {
  createJsonCodec,
  type JsonCodecOptions,
} from "./core/typed/json-codec"
export {
  createTyped,
  getTyped,
  modifyTyped,
  sequentialKey,
  type TypedDocument,
  typedBatchItems,
  updateTyped,
} from "./core/typed/typed-documents"
export {
  type BatchStatus,
  combineAll,
  combineOutcomes,
  emptyOutcome,
  failedAt,
  outcomeStatus,
  requireAllSucceeded,
  succeededAt,
} from "./core/batch/batch-outcome"
export { type BatchEngineDeps, type ExecuteProgram, runBatch } from "./core/batch/run-batch"
export { formatCounter, parseCounter } from "./core/counter/counter"
export { docKey } from "./core/document"
export {
  alreadyExists,
  backendFailure,
  batchItemFailure,
  DbError,
  type DbErrorOptions,
  decodeError,
  invalidDelta,
  invalidKey,
  notConnected,
  notFound,
  versionConflict,
} from "./core/errors/db-error"
export { hasCode, isDbError, toDbError } from "./core/errors/guards"
export { type SerializeOptions, serializeError } from "./core/errors/serialize-error"
export {
  createInterpreter,
  Interpreter,
  type InterpreterDeps,
} from "./core/interpreter/interpreter"
export {
  batchCreateDocs,
  continueOnFailure,
  stopOnFailure,
} from "./core/program/batch-create"
export {
  andThen,
  createDoc,
  fail,
  fromResult,
  getCounter,
  getDoc,
  incrementCounter,
  map,
  modifyDoc,
  pure,
  removeDoc,
  sequence,
  updateDoc,
} from "./core/program/program"
export {
  andThenResult,
  err,
  isErr,
  isOk,
  mapError,
  mapResult,
  ok,
  orElse,
  unwrap,
} from "./core/result/result"
export {
  MemoryDocumentBackend,
  type MemoryDocumentBackendOptions,
} from "./adapters/memory/memory-document-backend"
export { emptySnapshot, type MemorySnapshot, snapshotOf } from "./adapters/memory/memory-snapshot"
export { type InMemoryRun, runInMemory } from "./adapters/memory/run-in-memory"
export {
  type ConnectFromConfigOptions,
  connectFromConfig,
  createRedisSession,
  type RedisSession,
} from "./adapters/redis/create"
export { type BridgeCall, type ScriptReply, settle } from "./adapters/redis/driver-bridge"
export {
  type CreateRedisClient,
  createRedisClient,
  type RedisClientSettings,
  type RedisDocumentClient,
} from "./adapters/redis/redis-client"
export {
  type ConnectionState,
  RedisConnection,
  type RedisConnectionDeps,
  type RedisConnectionOptions,
} from "./adapters/redis/redis-connection"
export {
  RedisDocumentBackend,
  type RedisDocumentBackendDeps,
} from "./adapters/redis/redis-document-backend"
export type {
  BatchEntry,
  BatchFailure,
  BatchItem,
  BatchOutcome,
  BatchSource,
  ContinuePredicate,
} from "./ports/batch"
export type {
  BatchCreateCommand,
  Command,
  CommandKind,
  CommandResults,
  CreateCommand,
  GetCommand,
  GetCounterCommand,
  IncrementCounterCommand,
  RemoveCommand,
  UpdateCommand,
} from "./ports/command"
export type { AppError, DbErrorCode, ErrorContext, SerializedError } from "./ports/db-error"
export {
  type DocKey,
  type DocumentValue,
  type DocVersion,
  type RawContent,
  UNCONDITIONAL_VERSION,
} from "./ports/document"
export type { DocumentBackend } from "./ports/document-backend"
export type { DocumentCodec } from "./ports/document-codec"
export type { ProgramInterpreter } from "./ports/interpreter"
export type {
  Chain,
  ChainVisitor,
  Failure,
  Instruction,
  Program,
  Pure,
  Suspend,
} from "./ports/program"
export type { DbResult, Err, Ok } from "./ports/result"
