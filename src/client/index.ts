/**
 * Storage Client
 *
 * One method per XML API operation. Each builds a request descriptor, sends
 * it once through the injected transport and interprets the response as a
 * {@link Result}.
 */

import { configBuilder, type StorageConfig, type StorageConfigBuilder } from "../config/index.js";
import { createAuthProvider, type AuthProvider, type Credentials } from "../credentials/index.js";
import {
  ConfigurationError,
  NetworkError,
  ServiceError,
  ValidationError,
  err,
  ok,
  serverNotFound,
  type OperationError,
  type Result,
} from "../error/index.js";
import { ConsoleLogger, LoggingTransport, type Logger } from "../observability/logging.js";
import { RequestBuilder } from "../request/index.js";
import { AuthorizedTransport, FetchTransport, type HttpResponse, type HttpTransport } from "../transport/index.js";
import {
  HttpMethod,
  type CopyObjectRequest,
  type CorsRule,
  type InsertBucketOptions,
  type InsertObjectRequest,
  type RequestDescriptor,
  type ResponseEnvelope,
} from "../types/index.js";

export const PROJECT_ID_HEADER = "x-goog-project-id";
export const API_VERSION_HEADER = "x-goog-api-version";

/**
 * Operation surface of a Cloud Storage client. The XML API client is one
 * implementation; callers depend only on this interface.
 */
export interface StorageService {
  /** List the project's buckets (XML listing). */
  getBuckets(): Promise<Result<Buffer, ServiceError>>;

  /** List a bucket's objects (XML listing). */
  getBucket(bucket: string): Promise<Result<Buffer, ServiceError>>;

  getBucketCors(bucket: string): Promise<Result<Buffer, ServiceError>>;

  getBucketLocation(bucket: string): Promise<Result<Buffer, ServiceError>>;

  /** Create a bucket; malformed names fail locally with a ValidationError. */
  insertBucket(
    bucket: string,
    options?: InsertBucketOptions
  ): Promise<Result<Buffer, OperationError>>;

  setBucketCors(bucket: string, rule?: CorsRule): Promise<Result<Buffer, ServiceError>>;

  deleteBucket(bucket: string): Promise<Result<Buffer, ServiceError>>;

  getObject(bucket: string, object: string): Promise<Result<Buffer, ServiceError>>;

  getObjectAcls(bucket: string, object: string): Promise<Result<Buffer, ServiceError>>;

  /** HEAD the object; succeeds with the status line and headers, not a body. */
  getObjectMetadata(bucket: string, object: string): Promise<Result<ResponseEnvelope, ServiceError>>;

  insertObject(request: InsertObjectRequest): Promise<Result<Buffer, ServiceError>>;

  copyObject(request: CopyObjectRequest): Promise<Result<Buffer, ServiceError>>;

  deleteObject(bucket: string, object: string): Promise<Result<Buffer, ServiceError>>;

  /** Get the configuration. */
  config(): StorageConfig;
}

/**
 * Client for the Cloud Storage XML API.
 */
export class XmlStorageClient implements StorageService {
  private readonly _config: StorageConfig;
  private readonly transport: HttpTransport;
  private readonly requests: RequestBuilder;

  constructor(config: StorageConfig, transport: HttpTransport) {
    this._config = config;
    this.transport = transport;
    this.requests = new RequestBuilder({
      serviceHost: config.serviceHost,
      corsDefaults: config.corsDefaults,
    });
  }

  config(): StorageConfig {
    return this._config;
  }

  async getBuckets(): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildListBucketsRequest());
  }

  async getBucket(bucket: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildBucketRequest(bucket));
  }

  async getBucketCors(bucket: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildBucketRequest(bucket, "?cors"));
  }

  async getBucketLocation(bucket: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildBucketRequest(bucket, "?location"));
  }

  async insertBucket(
    bucket: string,
    options?: InsertBucketOptions
  ): Promise<Result<Buffer, OperationError>> {
    let request: RequestDescriptor;
    try {
      request = this.requests.buildCreateBucketRequest(bucket, options?.acl, options?.locationConstraint);
    } catch (error) {
      if (error instanceof ValidationError) {
        return err(error);
      }
      throw error;
    }
    return this.send(request);
  }

  async setBucketCors(bucket: string, rule?: CorsRule): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildCorsRequest(bucket, rule));
  }

  async deleteBucket(bucket: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildBucketRequest(bucket, undefined, HttpMethod.DELETE));
  }

  async getObject(bucket: string, object: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildGetObjectRequest(bucket, object));
  }

  async getObjectAcls(bucket: string, object: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildObjectRequest(bucket, object, "?acl"));
  }

  async getObjectMetadata(
    bucket: string,
    object: string
  ): Promise<Result<ResponseEnvelope, ServiceError>> {
    const result = await this.exchange(
      this.requests.buildObjectRequest(bucket, object, undefined, HttpMethod.HEAD)
    );
    if (!result.success) {
      return result;
    }
    const { status, statusText, headers } = result.data;
    return ok({ status, statusText, headers });
  }

  async insertObject(request: InsertObjectRequest): Promise<Result<Buffer, ServiceError>> {
    return this.send(
      this.requests.buildInsertObjectRequest(
        request.bucket,
        request.object,
        request.body,
        request.contentType,
        request.contentEncoding,
        request.acl
      )
    );
  }

  async copyObject(request: CopyObjectRequest): Promise<Result<Buffer, ServiceError>> {
    return this.send(
      this.requests.buildCopyObjectRequest(
        request.sourceBucket,
        request.sourceObject,
        request.destinationBucket,
        request.destinationObject,
        request.acl
      )
    );
  }

  async deleteObject(bucket: string, object: string): Promise<Result<Buffer, ServiceError>> {
    return this.send(this.requests.buildObjectRequest(bucket, object, undefined, HttpMethod.DELETE));
  }

  /**
   * Send a request and keep only the response body.
   */
  private async send(request: RequestDescriptor): Promise<Result<Buffer, ServiceError>> {
    const result = await this.exchange(request);
    return result.success ? ok(result.data.body) : result;
  }

  /**
   * One round trip: add the project and version headers, frame the body,
   * send, and map the outcome. Faults other than an unresolvable host
   * reject unchanged.
   */
  private async exchange(request: RequestDescriptor): Promise<Result<HttpResponse, ServiceError>> {
    const headers: Record<string, string> = {
      ...request.headers,
      [PROJECT_ID_HEADER]: this._config.projectId,
      [API_VERSION_HEADER]: this._config.apiVersion,
    };

    const { method, body } = request;
    if (method === HttpMethod.POST || method === HttpMethod.PUT || (body && body.length > 0)) {
      headers["Content-Length"] = body && body.length > 0 ? String(body.byteLength) : "0";
    }

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method,
        url: `http://${request.host}${request.path}`,
        headers,
        body,
        timeout: this._config.timeout,
      });
    } catch (error) {
      if (error instanceof NetworkError && error.isDnsFailure) {
        return err(serverNotFound());
      }
      throw error;
    }

    if (response.status >= 300) {
      return err(new ServiceError(response.status, response.statusText));
    }
    return ok(response);
  }
}

/**
 * Storage client builder.
 */
export class StorageClientBuilder {
  private _config?: StorageConfig;
  private _configBuilder: StorageConfigBuilder = configBuilder();
  private _credentials?: Credentials;
  private _authProvider?: AuthProvider;
  private _transport?: HttpTransport;
  private _logger?: Logger;

  /**
   * Set the full configuration.
   */
  config(config: StorageConfig): this {
    this._config = config;
    return this;
  }

  /**
   * Set the project ID.
   */
  projectId(projectId: string): this {
    this._configBuilder.projectId(projectId);
    return this;
  }

  /**
   * Set the API version header value.
   */
  apiVersion(version: string): this {
    this._configBuilder.apiVersion(version);
    return this;
  }

  /**
   * Set the service host.
   */
  serviceHost(host: string): this {
    this._configBuilder.serviceHost(host);
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this._configBuilder.timeout(ms);
    return this;
  }

  /**
   * Set explicit credentials.
   */
  credentials(credentials: Credentials): this {
    this._credentials = credentials;
    return this;
  }

  /**
   * Use explicit access token.
   */
  accessToken(token: string): this {
    this._credentials = { type: "access_token", token };
    return this;
  }

  /**
   * Use a ready-made auth provider.
   */
  authProvider(provider: AuthProvider): this {
    this._authProvider = provider;
    return this;
  }

  /**
   * Set the base HTTP transport; the authorizing layer wraps it.
   */
  transport(transport: HttpTransport): this {
    this._transport = transport;
    return this;
  }

  /**
   * Enable request logging.
   */
  enableLogging(enable: boolean = true): this {
    this._configBuilder.enableLogging(enable);
    return this;
  }

  /**
   * Logger receiving request traces when logging is enabled.
   */
  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    this._configBuilder.fromEnv(env);
    const token = env.GOOGLE_OAUTH_ACCESS_TOKEN;
    if (token && !this._credentials) {
      this._credentials = { type: "access_token", token };
    }
    return this;
  }

  /**
   * Build the storage client.
   */
  async build(): Promise<StorageService> {
    const config = this._config ?? this._configBuilder.build();
    const base = this._transport ?? new FetchTransport(config.timeout);

    let provider = this._authProvider;
    if (!provider && this._credentials) {
      provider = await createAuthProvider(this._credentials, base);
    }
    if (!provider) {
      throw new ConfigurationError(
        "Credentials must be provided (call credentials(), accessToken() or set GOOGLE_OAUTH_ACCESS_TOKEN)",
        "InvalidCredentials"
      );
    }

    let transport: HttpTransport = new AuthorizedTransport(base, provider);
    if (config.enableLogging) {
      transport = new LoggingTransport(transport, this._logger ?? new ConsoleLogger("debug"));
    }

    return new XmlStorageClient(config, transport);
  }
}

/**
 * Create a new storage client builder.
 */
export function clientBuilder(): StorageClientBuilder {
  return new StorageClientBuilder();
}

/**
 * Create a storage client from environment variables.
 */
export async function createClientFromEnv(): Promise<StorageService> {
  return clientBuilder().fromEnv().build();
}

/**
 * Create a storage client with explicit configuration and transport.
 */
export function createClient(config: StorageConfig, transport: HttpTransport): StorageService {
  return new XmlStorageClient(config, transport);
}
