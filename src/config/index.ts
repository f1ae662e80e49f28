/**
 * Storage Configuration Module
 *
 * Immutable client configuration: project, API version, service host and
 * the CORS fallbacks threaded into every request builder call.
 */

import { z } from "zod";
import { ConfigurationError } from "../error/index.js";
import type { CorsDefaults } from "../types/index.js";

/**
 * Storage client configuration.
 */
export interface StorageConfig {
  /** Project identifier sent as `x-goog-project-id`. */
  readonly projectId: string;
  /** XML API version sent as `x-goog-api-version`. */
  readonly apiVersion: string;
  /** Service DNS name; buckets are addressed as `{bucket}.{serviceHost}`. */
  readonly serviceHost: string;
  /** Fallback values for CORS rules. */
  readonly corsDefaults: CorsDefaults;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** Trace every request and response at debug level. */
  readonly enableLogging: boolean;
}

export const DEFAULT_API_VERSION = "2";
export const DEFAULT_SERVICE_HOST = "storage.googleapis.com";

export const DEFAULT_CORS: CorsDefaults = Object.freeze({
  origin: "*",
  method: "GET",
  responseHeader: "gcs-demo",
  maxAgeSec: 1800,
});

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<StorageConfig, "projectId"> = {
  apiVersion: DEFAULT_API_VERSION,
  serviceHost: DEFAULT_SERVICE_HOST,
  corsDefaults: DEFAULT_CORS,
  timeout: 30000,
  enableLogging: false,
};

const CorsDefaultsSchema = z.object({
  origin: z.string().min(1, "Default origin is required"),
  method: z.string().min(1, "Default method is required"),
  responseHeader: z.string().min(1, "Default response header is required"),
  maxAgeSec: z.number().nonnegative(),
});

/**
 * Zod schema for storage configuration validation.
 */
const StorageConfigSchema = z.object({
  projectId: z.string().trim().min(1, "Project ID is required"),
  apiVersion: z.string().min(1),
  serviceHost: z
    .string()
    .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, "Service host must be a bare DNS name"),
  corsDefaults: CorsDefaultsSchema,
  timeout: z.number().int().positive(),
  enableLogging: z.boolean(),
});

/**
 * Validate a configuration, throwing {@link ConfigurationError} on failure.
 */
export function validateConfig(config: StorageConfig): void {
  const result = StorageConfigSchema.safeParse(config);
  if (result.success) {
    return;
  }

  const projectIssue = result.error.issues.find((issue) => issue.path[0] === "projectId");
  if (projectIssue) {
    throw new ConfigurationError(
      "Project ID must be specified (set GOOGLE_CLOUD_PROJECT or call projectId())",
      "MissingProject",
      result.error
    );
  }

  const details = result.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new ConfigurationError(`Invalid storage configuration: ${details}`, "InvalidConfig", result.error);
}

/**
 * Storage configuration builder.
 */
export class StorageConfigBuilder {
  private config: {
    -readonly [K in keyof StorageConfig]?: StorageConfig[K];
  } = {};

  /**
   * Set the project ID.
   */
  projectId(projectId: string): this {
    this.config.projectId = projectId;
    return this;
  }

  /**
   * Set the API version header value.
   */
  apiVersion(version: string): this {
    this.config.apiVersion = version;
    return this;
  }

  /**
   * Set the service host (for emulators or private endpoints).
   */
  serviceHost(host: string): this {
    this.config.serviceHost = host;
    return this;
  }

  /**
   * Override some or all CORS defaults.
   */
  corsDefaults(defaults: Partial<CorsDefaults>): this {
    this.config.corsDefaults = {
      ...(this.config.corsDefaults ?? DEFAULT_CORS),
      ...defaults,
    };
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Enable request logging.
   */
  enableLogging(enable: boolean = true): this {
    this.config.enableLogging = enable;
    return this;
  }

  /**
   * Load configuration from environment variables.
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const projectId = env.GOOGLE_CLOUD_PROJECT ?? env.GCLOUD_PROJECT;
    if (projectId) {
      this.config.projectId = projectId;
    }

    if (env.GCS_API_VERSION) {
      this.config.apiVersion = env.GCS_API_VERSION;
    }

    if (env.GCS_SERVICE_HOST) {
      this.config.serviceHost = env.GCS_SERVICE_HOST;
    }

    if (env.GCS_TIMEOUT_MS) {
      const timeout = Number(env.GCS_TIMEOUT_MS);
      if (!Number.isFinite(timeout)) {
        throw new ConfigurationError(`Invalid GCS_TIMEOUT_MS: ${env.GCS_TIMEOUT_MS}`);
      }
      this.config.timeout = timeout;
    }

    if (env.GCS_ENABLE_LOGGING) {
      this.config.enableLogging = env.GCS_ENABLE_LOGGING === "true" || env.GCS_ENABLE_LOGGING === "1";
    }

    return this;
  }

  /**
   * Build and validate the configuration.
   */
  build(): StorageConfig {
    const merged: StorageConfig = {
      ...DEFAULT_CONFIG,
      ...this.config,
      projectId: this.config.projectId ?? "",
    };

    validateConfig(merged);

    return Object.freeze({
      ...merged,
      corsDefaults: Object.freeze({ ...merged.corsDefaults }),
    });
  }
}

/**
 * Create a new storage config builder.
 */
export function configBuilder(): StorageConfigBuilder {
  return new StorageConfigBuilder();
}
