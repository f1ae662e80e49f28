/**
 * Cloud Storage XML API Client
 *
 * Request construction and response interpretation for bucket and object
 * operations, plus the interactive demo that drives them.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { clientBuilder } from "cloud-storage-xml-demo";
 *
 * const client = await clientBuilder()
 *   .projectId("123456")
 *   .accessToken(process.env.GOOGLE_OAUTH_ACCESS_TOKEN ?? "")
 *   .build();
 *
 * const result = await client.getBuckets();
 * if (result.success) {
 *   console.log(result.data.toString("utf-8"));
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 *
 * @module cloud-storage-xml-demo
 */

// Client
export {
  XmlStorageClient,
  StorageClientBuilder,
  clientBuilder,
  createClient,
  createClientFromEnv,
  PROJECT_ID_HEADER,
  API_VERSION_HEADER,
} from "./client/index.js";
export type { StorageService } from "./client/index.js";

// Configuration
export {
  StorageConfigBuilder,
  configBuilder,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_CORS,
  DEFAULT_API_VERSION,
  DEFAULT_SERVICE_HOST,
} from "./config/index.js";
export type { StorageConfig } from "./config/index.js";

// Request construction
export {
  RequestBuilder,
  validateBucketName,
  guessContentType,
  ACL_HEADER,
  COPY_SOURCE_HEADER,
} from "./request/index.js";
export type { RequestBuilderOptions, GuessedType } from "./request/index.js";

// XML
export {
  buildCorsXml,
  buildLocationConstraintXml,
  parseCorsXml,
  parseLocationXml,
  resolveCorsRule,
  formatMaxAge,
} from "./xml/index.js";

// Credentials
export {
  createAuthProvider,
  loadAuthorizedUserFile,
  AccessTokenAuthProvider,
  UserCredentialsAuthProvider,
  TOKEN_ENDPOINT,
} from "./credentials/index.js";
export type { AuthProvider, AuthorizedUserCredentials, Credentials, CachedToken } from "./credentials/index.js";

// Errors
export {
  StorageError,
  ValidationError,
  ServiceError,
  NetworkError,
  ConfigurationError,
  AuthenticationError,
  serverNotFound,
  isStorageError,
  ok,
  err,
  unwrap,
} from "./error/index.js";
export type { Result, OperationError, BucketNameRule } from "./error/index.js";

// Transport
export { FetchTransport, AuthorizedTransport, getHeader } from "./transport/index.js";
export type { HttpRequest, HttpResponse, HttpTransport } from "./transport/index.js";

// Observability
export { ConsoleLogger, NoopLogger, LoggingTransport, parseLogLevel } from "./observability/logging.js";
export type { Logger, LogLevel, LogContext } from "./observability/logging.js";

// Simulation
export { MockTransport } from "./simulation/index.js";
export type { MockResponse } from "./simulation/index.js";

// Types
export { PredefinedAcl, HttpMethod, isLocationConstraint } from "./types/index.js";
export type {
  LocationConstraint,
  BucketSubresource,
  ObjectSubresource,
  CorsRule,
  CorsDefaults,
  RequestDescriptor,
  ResponseEnvelope,
  InsertObjectRequest,
  CopyObjectRequest,
  InsertBucketOptions,
} from "./types/index.js";
