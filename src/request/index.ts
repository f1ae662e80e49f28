/**
 * Request Builder
 *
 * Pure translation from an operation and its parameters to a wire-level
 * {@link RequestDescriptor}. Nothing here performs I/O.
 */

import { ValidationError } from "../error/index.js";
import {
  HttpMethod,
  isLocationConstraint,
  type BucketSubresource,
  type CorsDefaults,
  type CorsRule,
  type ObjectSubresource,
  type RequestDescriptor,
} from "../types/index.js";
import { buildCorsXml, buildLocationConstraintXml } from "../xml/index.js";
import { guessContentType } from "./mime.js";

export { guessContentType, type GuessedType } from "./mime.js";

/** Canned ACL header. */
export const ACL_HEADER = "x-goog-acl";
/** Source of a server-side copy, `/{bucket}/{object}`. */
export const COPY_SOURCE_HEADER = "x-goog-copy-source";

const BUCKET_MIN_LENGTH = 3;
const BUCKET_MAX_LENGTH = 63;

/**
 * Validate a bucket name before creation.
 *
 * Rules are checked in order (allowed characters, first character, last
 * character, length) and the first violation is reported.
 *
 * @throws {ValidationError} naming the violated rule
 */
export function validateBucketName(bucket: string): void {
  if (!/^[\w\-.]+$/.test(bucket)) {
    throw new ValidationError(
      "Bucket names can only contain letters, numbers, -, _, or .",
      "characters",
      bucket
    );
  }
  if (!/^[A-Za-z0-9]/.test(bucket)) {
    throw new ValidationError("Bucket names can only start with letters or numbers.", "start", bucket);
  }
  if (!/[A-Za-z0-9]$/.test(bucket)) {
    throw new ValidationError(
      `Bucket names can only end with letters or numbers. ${bucket}`,
      "end",
      bucket
    );
  }
  if (bucket.length < BUCKET_MIN_LENGTH || bucket.length > BUCKET_MAX_LENGTH) {
    throw new ValidationError(
      `Bucket names must contain ${BUCKET_MIN_LENGTH} to ${BUCKET_MAX_LENGTH} characters.`,
      "length",
      bucket
    );
  }
}

export interface RequestBuilderOptions {
  serviceHost: string;
  corsDefaults: CorsDefaults;
}

/**
 * Builds request descriptors for the XML API's virtual-hosted bucket scheme.
 */
export class RequestBuilder {
  private readonly serviceHost: string;
  private readonly corsDefaults: CorsDefaults;

  constructor(options: RequestBuilderOptions) {
    this.serviceHost = options.serviceHost;
    this.corsDefaults = options.corsDefaults;
  }

  /**
   * Host for a bucket-scoped request.
   */
  bucketHost(bucket: string): string {
    return `${bucket}.${this.serviceHost}`;
  }

  /**
   * List all buckets of the project.
   */
  buildListBucketsRequest(): RequestDescriptor {
    return {
      host: this.serviceHost,
      path: "",
      method: HttpMethod.GET,
      headers: {},
    };
  }

  /**
   * Request against a bucket or one of its sub-resources.
   */
  buildBucketRequest(
    bucket: string,
    suffix?: BucketSubresource,
    method: HttpMethod = HttpMethod.GET
  ): RequestDescriptor {
    return {
      host: this.bucketHost(bucket),
      path: suffix ? `/${suffix}` : "",
      method,
      headers: {},
    };
  }

  /**
   * Create a bucket. Only `US` and `EU` locations produce a body.
   *
   * @throws {ValidationError} if the bucket name is malformed
   */
  buildCreateBucketRequest(bucket: string, acl?: string, locationConstraint?: string): RequestDescriptor {
    validateBucketName(bucket);

    const request = this.buildBucketRequest(bucket, undefined, HttpMethod.PUT);
    if (isLocationConstraint(locationConstraint)) {
      request.body = Buffer.from(buildLocationConstraintXml(locationConstraint), "utf8");
    }
    if (acl) {
      request.headers[ACL_HEADER] = acl;
    }
    return request;
  }

  /**
   * Replace the CORS configuration of a bucket.
   */
  buildCorsRequest(bucket: string, rule?: CorsRule): RequestDescriptor {
    const request = this.buildBucketRequest(bucket, "?cors", HttpMethod.PUT);
    request.body = Buffer.from(buildCorsXml(rule, this.corsDefaults), "utf8");
    return request;
  }

  /**
   * Request against an object or its ACL.
   */
  buildObjectRequest(
    bucket: string,
    object: string,
    suffix?: ObjectSubresource,
    method: HttpMethod = HttpMethod.GET
  ): RequestDescriptor {
    return {
      host: this.bucketHost(bucket),
      path: `/${object}${suffix ?? ""}`,
      method,
      headers: {},
    };
  }

  /**
   * Download an object.
   */
  buildGetObjectRequest(bucket: string, object: string): RequestDescriptor {
    return this.buildObjectRequest(bucket, object);
  }

  /**
   * Upload an object. Missing content type or encoding is inferred from the
   * object name; inference only fills the fields the caller left out.
   */
  buildInsertObjectRequest(
    bucket: string,
    object: string,
    body: Buffer,
    contentType?: string,
    contentEncoding?: string,
    acl?: string
  ): RequestDescriptor {
    if (!contentType || !contentEncoding) {
      const guessed = guessContentType(object);
      contentType = contentType || guessed.contentType;
      contentEncoding = contentEncoding || guessed.contentEncoding;
    }

    const request = this.buildObjectRequest(bucket, object, undefined, HttpMethod.PUT);
    request.body = body;
    if (contentType) {
      request.headers["Content-Type"] = contentType;
    }
    if (contentEncoding) {
      request.headers["Content-Encoding"] = contentEncoding;
    }
    if (acl) {
      request.headers[ACL_HEADER] = acl;
    }
    return request;
  }

  /**
   * Server-side copy. The destination name defaults to the source name.
   */
  buildCopyObjectRequest(
    sourceBucket: string,
    sourceObject: string,
    destinationBucket: string,
    destinationObject?: string,
    acl?: string
  ): RequestDescriptor {
    const request = this.buildObjectRequest(
      destinationBucket,
      destinationObject || sourceObject,
      undefined,
      HttpMethod.PUT
    );
    request.headers[COPY_SOURCE_HEADER] = `/${sourceBucket}/${sourceObject}`;
    if (acl) {
      request.headers[ACL_HEADER] = acl;
    }
    return request;
  }
}
