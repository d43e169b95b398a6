export { QueryGateway, createResultStore, duckdbOpener } from "./gateway";
export type { GatewayOptions, OpenDatabase } from "./gateway";
export {
  CommandDispatcher,
  decodeCommand,
  decodeRawCommand,
  errorEnvelope,
} from "./services/commandDispatcher";
export type {
  Command,
  CommandExtension,
  Envelope,
  ExtensionResult,
  ProjectControl,
  RawCommand,
  Respond,
} from "./services/commandDispatcher";
export { loadConfig, defaultConfig, ConfigError } from "./services/config";
export type { GatewayConfig } from "./services/config";
export { CursorRegistry, Registration } from "./services/cursorRegistry";
export { encodeArrow } from "./services/arrowEncoder";
export { decodeArrowFile, duckdbTypeFor } from "./services/arrowLoader";
export { DuckDBDatabase, MEMORY_DATABASE } from "./services/duckdb";
export type { Database, OutputFormat, QueryCursor } from "./services/duckdb";
export {
  CancelledError,
  ConflictError,
  DecodeError,
  ExecutionError,
  GatewayError,
  UnavailableError,
} from "./services/errors";
export type { ErrorKind } from "./services/errors";
export { createLogger, silentLogger } from "./services/logger";
export type { Logger, LogLevel } from "./services/logger";
export {
  FilesystemResultStore,
  MemoryResultStore,
  NoopResultStore,
  ResultCache,
  fingerprint,
} from "./services/resultCacheService";
export type { ResultStore } from "./services/resultCacheService";
export { TaskExecutor } from "./services/taskExecutor";
export { createHttpApp, toHttpResponse } from "./transport/httpTransport";
export type { GatewayControl } from "./transport/httpTransport";
export { SocketSession, attachSocketServer, toFrame } from "./transport/socketTransport";
