/**
 * Common types for Cloud Storage XML API operations.
 */

/**
 * Predefined (canned) ACL tokens accepted by the `x-goog-acl` header.
 *
 * The client forwards ACL strings verbatim, so values outside this list are
 * still sent and left for the service to reject.
 */
export enum PredefinedAcl {
  Private = "private",
  PublicRead = "public-read",
  PublicReadWrite = "public-read-write",
  AuthenticatedRead = "authenticated-read",
  BucketOwnerRead = "bucket-owner-read",
  BucketOwnerFullControl = "bucket-owner-full-control",
  ProjectPrivate = "project-private",
}

/**
 * HTTP methods used by the XML API.
 */
export enum HttpMethod {
  GET = "GET",
  PUT = "PUT",
  POST = "POST",
  DELETE = "DELETE",
  HEAD = "HEAD",
}

/**
 * Bucket location. Any other value is treated as "no constraint".
 */
export type LocationConstraint = "US" | "EU";

/**
 * Query suffixes addressing a bucket sub-resource.
 */
export type BucketSubresource = "?cors" | "?location";

/**
 * Query suffixes addressing an object sub-resource.
 */
export type ObjectSubresource = "?acl";

/**
 * CORS rule as entered by the caller. Every field is optional; missing or
 * blank values are filled from {@link CorsDefaults}.
 */
export interface CorsRule {
  origins?: string[];
  methods?: string[];
  responseHeaders?: string[];
  /** Whole seconds, fractional seconds, or a pre-formatted string. */
  maxAgeSec?: number | string;
}

/**
 * Single-value fallbacks for CORS rules.
 */
export interface CorsDefaults {
  readonly origin: string;
  readonly method: string;
  readonly responseHeader: string;
  readonly maxAgeSec: number;
}

/**
 * Wire-level request produced by the request builder.
 */
export interface RequestDescriptor {
  /** Bare service host or `{bucket}.{serviceHost}`. */
  host: string;
  /** Path and query appended to the host; empty for the bucket root. */
  path: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: Buffer;
}

/**
 * Response status line and headers, returned by metadata lookups.
 */
export interface ResponseEnvelope {
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

/**
 * Parameters for uploading an object.
 */
export interface InsertObjectRequest {
  bucket: string;
  object: string;
  body: Buffer;
  contentType?: string;
  contentEncoding?: string;
  acl?: string;
}

/**
 * Parameters for copying an object.
 */
export interface CopyObjectRequest {
  sourceBucket: string;
  sourceObject: string;
  destinationBucket: string;
  /** Defaults to the source object name. */
  destinationObject?: string;
  acl?: string;
}

/**
 * Options for bucket creation.
 */
export interface InsertBucketOptions {
  acl?: string;
  /** Only `US` and `EU` produce a location body. */
  locationConstraint?: string;
}

/**
 * Check whether a string names a supported location.
 */
export function isLocationConstraint(value: string | undefined): value is LocationConstraint {
  return value === "US" || value === "EU";
}
