/**
 * Menu commands. Each one collects its inputs, performs a single client
 * operation and reports the outcome through the logger.
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { StorageService } from "../client/index.js";
import { unwrap } from "../error/index.js";
import type { Logger } from "../observability/logging.js";
import { PredefinedAcl, type ResponseEnvelope } from "../types/index.js";
import { UserInput, commaList, type InputParameter, type InputParameters, type Prompter } from "./prompt.js";

export const UPLOAD_FILE_NAME = "cloud-storage-upload-test.txt";
export const UPLOAD_FILE_CONTENT = "This is a test file for the Cloud Storage demo.";

const BUCKET_INPUT: InputParameter = { text: "Bucket Name" };
const OBJECT_INPUT: InputParameter = { text: "Object Name" };
const ACL_INPUT: InputParameter = { text: "an acl (private, public-read, etc)", default: PredefinedAcl.Private };

/**
 * Collaborators shared by every command.
 */
export interface CommandContext {
  prompter: Prompter;
  logger: Logger;
  /** Directory downloaded objects are written to. */
  downloadDir: string;
  /** Directory the upload test file is created in. */
  workDir: string;
}

/**
 * Base class for menu commands.
 */
export abstract class StorageCommand<T extends Buffer | string = Buffer> {
  protected readonly input: UserInput;

  constructor(
    readonly description: string,
    protected readonly client: StorageService,
    protected readonly context: CommandContext,
    parameters: InputParameters = {}
  ) {
    this.input = new UserInput(parameters, context.prompter, context.logger);
  }

  /**
   * Collect input, call the API and handle the result.
   *
   * @throws the operation's error after logging it
   */
  async run(): Promise<void> {
    await this.input.collect();

    let result: T;
    try {
      result = await this.execute();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.context.logger.error(`${this.description} failed: ${detail}`);
      throw error;
    }

    await this.processResult(result);
  }

  protected abstract execute(): Promise<T>;

  protected async processResult(result: T): Promise<void> {
    const value: Buffer | string = result;
    const text = typeof value === "string" ? value : value.toString("utf-8");
    if (text) {
      this.context.logger.info(text);
    }
  }
}

export class GetBucketsCommand extends StorageCommand {
  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getBuckets());
  }
}

export class GetBucketCommand extends StorageCommand {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT });
  }

  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getBucket(this.input.text("bucket")));
  }
}

export class GetBucketCorsCommand extends StorageCommand {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT });
  }

  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getBucketCors(this.input.text("bucket")));
  }
}

export class GetBucketLocationCommand extends StorageCommand {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT });
  }

  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getBucketLocation(this.input.text("bucket")));
  }
}

export class InsertBucketCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, {
      bucket: BUCKET_INPUT,
      location: { text: "a location (US or EU)", default: "US" },
      acl: ACL_INPUT,
    });
  }

  protected async execute(): Promise<string> {
    const bucket = this.input.text("bucket");
    unwrap(
      await this.client.insertBucket(bucket, {
        locationConstraint: this.input.optional("location"),
        acl: this.input.optional("acl"),
      })
    );
    return `Bucket "${bucket}" created`;
  }
}

export class SetBucketCorsCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    const defaults = client.config().corsDefaults;
    super(description, client, context, {
      bucket: BUCKET_INPUT,
      origins: { text: "a comma-separated list of origins", default: defaults.origin, processing: commaList },
      methods: { text: "a comma-separated list of methods", default: defaults.method, processing: commaList },
      headers: {
        text: "a comma-separated list of headers",
        default: defaults.responseHeader,
        processing: commaList,
      },
      age: { text: "max cache time in seconds", default: defaults.maxAgeSec },
    });
  }

  protected async execute(): Promise<string> {
    unwrap(
      await this.client.setBucketCors(this.input.text("bucket"), {
        origins: this.input.list("origins"),
        methods: this.input.list("methods"),
        responseHeaders: this.input.list("headers"),
        maxAgeSec: this.input.text("age"),
      })
    );
    return "Cors set successfully";
  }
}

export class DeleteBucketCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT });
  }

  protected async execute(): Promise<string> {
    const bucket = this.input.text("bucket");
    unwrap(await this.client.deleteBucket(bucket));
    return `${bucket} deleted.`;
  }
}

/**
 * Downloads an object into the download directory, named after the last
 * path segment of the object name.
 */
export class GetObjectCommand extends StorageCommand {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT, object: OBJECT_INPUT });
  }

  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getObject(this.input.text("bucket"), this.input.text("object")));
  }

  protected override async processResult(result: Buffer): Promise<void> {
    const segments = this.input.text("object").split("/");
    const target = path.join(this.context.downloadDir, segments[segments.length - 1]);
    await fs.writeFile(target, result);
    this.context.logger.info(`File downloaded locally to ${target}`);
  }
}

export class GetObjectAclsCommand extends StorageCommand {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT, object: OBJECT_INPUT });
  }

  protected async execute(): Promise<Buffer> {
    return unwrap(await this.client.getObjectAcls(this.input.text("bucket"), this.input.text("object")));
  }
}

/**
 * Render a HEAD response as its status line followed by one header per line.
 */
export function formatEnvelope(envelope: ResponseEnvelope): string {
  const lines = [`${envelope.status} ${envelope.statusText}`];
  for (const [name, value] of Object.entries(envelope.headers)) {
    lines.push(`${name}: ${value}`);
  }
  return lines.join("\n");
}

export class GetObjectMetadataCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT, object: OBJECT_INPUT });
  }

  protected async execute(): Promise<string> {
    const envelope = unwrap(
      await this.client.getObjectMetadata(this.input.text("bucket"), this.input.text("object"))
    );
    return formatEnvelope(envelope);
  }
}

/**
 * Uploads a local file. A blank or missing path falls back to a small test
 * file, created on first use.
 */
export class InsertObjectCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, {
      "file-path": {
        text: "path to file",
        default: UPLOAD_FILE_NAME,
        processing: (value) => resolveUploadPath(value, context),
      },
      bucket: BUCKET_INPUT,
      object: { text: "new name", default: "file name" },
      "content-type": { text: "content-type", default: "best guess" },
      encoding: { text: "encoding", default: "best guess" },
      acl: ACL_INPUT,
    });
  }

  protected async execute(): Promise<string> {
    const filePath = this.input.text("file-path");
    const body = await fs.readFile(filePath);
    unwrap(
      await this.client.insertObject({
        bucket: this.input.text("bucket"),
        object: this.input.optional("object") ?? path.basename(filePath),
        body,
        contentType: this.input.optional("content-type"),
        contentEncoding: this.input.optional("encoding"),
        acl: this.input.optional("acl"),
      })
    );
    return `File ${filePath} was uploaded.`;
  }
}

/**
 * Existing file to upload, or the test file when the path is blank or
 * missing.
 */
export async function resolveUploadPath(filePath: string, context: CommandContext): Promise<string> {
  if (!filePath) {
    return createTestFile(context.workDir);
  }
  try {
    await fs.access(filePath);
    return filePath;
  } catch {
    context.logger.error(`File does not exist, creating ${UPLOAD_FILE_NAME} file.`);
    return createTestFile(context.workDir);
  }
}

async function createTestFile(dir: string): Promise<string> {
  const filePath = path.join(dir, UPLOAD_FILE_NAME);
  try {
    await fs.writeFile(filePath, UPLOAD_FILE_CONTENT, { flag: "wx" });
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
      throw error;
    }
  }
  return filePath;
}

export class CopyObjectCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, {
      "original-bucket": { text: "current bucket" },
      "original-object": { text: "object to copy" },
      "new-bucket": { text: "new bucket" },
      "new-object": { text: "new object name", default: "original object name" },
    });
  }

  protected async execute(): Promise<string> {
    const sourceObject = this.input.text("original-object");
    const destinationBucket = this.input.text("new-bucket");
    const destinationObject = this.input.optional("new-object") ?? sourceObject;
    unwrap(
      await this.client.copyObject({
        sourceBucket: this.input.text("original-bucket"),
        sourceObject,
        destinationBucket,
        destinationObject,
      })
    );
    return `${destinationObject} has been copied to ${destinationBucket}.`;
  }
}

export class DeleteObjectCommand extends StorageCommand<string> {
  constructor(description: string, client: StorageService, context: CommandContext) {
    super(description, client, context, { bucket: BUCKET_INPUT, object: OBJECT_INPUT });
  }

  protected async execute(): Promise<string> {
    const object = this.input.text("object");
    unwrap(await this.client.deleteObject(this.input.text("bucket"), object));
    return `${object} deleted.`;
  }
}

export type MenuCommand = StorageCommand<Buffer> | StorageCommand<string>;

/**
 * All commands in menu order.
 */
export function createCommands(client: StorageService, context: CommandContext): MenuCommand[] {
  return [
    new GetBucketsCommand("Get all buckets", client, context),
    new GetBucketCommand("Get a bucket", client, context),
    new GetBucketCorsCommand("Get bucket CORS", client, context),
    new GetBucketLocationCommand("Get bucket location", client, context),
    new InsertBucketCommand("Create a bucket", client, context),
    new SetBucketCorsCommand("Set bucket CORS", client, context),
    new DeleteBucketCommand("Delete a bucket", client, context),
    new GetObjectCommand("Download an object", client, context),
    new GetObjectAclsCommand("Get object ACLs", client, context),
    new GetObjectMetadataCommand("Get object metadata", client, context),
    new InsertObjectCommand("Upload an object", client, context),
    new CopyObjectCommand("Copy an object", client, context),
    new DeleteObjectCommand("Delete an object", client, context),
  ];
}
