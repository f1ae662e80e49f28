/**
 * Tests for menu commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { createClient, type StorageService } from "../../client/index.js";
import { configBuilder } from "../../config/index.js";
import { ServiceError, ValidationError } from "../../error/index.js";
import type { Logger } from "../../observability/logging.js";
import { MockTransport } from "../../simulation/index.js";
import {
  CopyObjectCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  GetBucketsCommand,
  GetObjectCommand,
  GetObjectMetadataCommand,
  InsertBucketCommand,
  InsertObjectCommand,
  SetBucketCorsCommand,
  UPLOAD_FILE_CONTENT,
  UPLOAD_FILE_NAME,
  createCommands,
  formatEnvelope,
  type CommandContext,
} from "../commands.js";
import { ScriptedPrompter } from "../prompt.js";

describe("commands", () => {
  let dir: string;
  let transport: MockTransport;
  let client: StorageService;
  let logger: Logger;

  function context(answers: string[]): CommandContext {
    return { prompter: new ScriptedPrompter(answers), logger, downloadDir: dir, workDir: dir };
  }

  function bodyOf(index: number): string {
    const body = transport.requests[index].body;
    return body instanceof Buffer ? body.toString("utf-8") : body ?? "";
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "storage-cli-"));
    transport = new MockTransport();
    client = createClient(configBuilder().projectId("test-project").build(), transport);
    logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn(), trace: vi.fn() };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("logs the listing returned by the service", async () => {
    transport.enqueue({ body: "<ListAllMyBucketsResult/>" });

    await new GetBucketsCommand("Get all buckets", client, context([])).run();

    expect(logger.info).toHaveBeenCalledWith("<ListAllMyBucketsResult/>");
  });

  it("creates a bucket with client defaults for blank answers", async () => {
    transport.enqueue({});

    await new InsertBucketCommand("Create a bucket", client, context(["photos", "", ""])).run();

    const request = transport.lastRequest();
    expect(request?.method).toBe("PUT");
    expect(request?.url).toBe("http://photos.storage.googleapis.com");
    expect(request?.body).toBeUndefined();
    expect(request?.headers["x-goog-acl"]).toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith('Bucket "photos" created');
  });

  it("logs and rethrows a local validation failure", async () => {
    const run = new InsertBucketCommand("Create a bucket", client, context(["-photos", "EU", ""])).run();

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    expect(logger.error).toHaveBeenCalledWith(
      "Create a bucket failed: Bucket names can only start with letters or numbers."
    );
    expect(transport.requests).toHaveLength(0);
  });

  it("logs and rethrows a service failure", async () => {
    transport.enqueue({ status: 409, statusText: "Conflict" });

    const run = new DeleteBucketCommand("Delete a bucket", client, context(["photos"])).run();

    await expect(run).rejects.toBeInstanceOf(ServiceError);
    expect(logger.error).toHaveBeenCalledWith("Delete a bucket failed: 409: Conflict");
    expect(logger.info).not.toHaveBeenCalled();
  });

  it("splits CORS lists and fills blanks from defaults", async () => {
    transport.enqueue({});
    const prompter = new ScriptedPrompter(["photos", "http://a.example,", "", "", "60"]);

    await new SetBucketCorsCommand("Set bucket CORS", client, { ...context([]), prompter }).run();

    expect(bodyOf(0)).toBe(
      '<?xml version="1.0" encoding="UTF-8"?><CorsConfig><Cors>' +
        "<Origins><Origin>http://a.example</Origin><Origin>*</Origin></Origins>" +
        "<Methods><Method>GET</Method></Methods>" +
        "<ResponseHeaders><ResponseHeader>gcs-demo</ResponseHeader></ResponseHeaders>" +
        "<MaxAgeSec>60</MaxAgeSec>" +
        "</Cors></CorsConfig>"
    );
    expect(prompter.questions[4]).toBe(
      "Enter max cache time in seconds (defaults to 1800 if blank): "
    );
    expect(logger.info).toHaveBeenCalledWith("Cors set successfully");
  });

  it("downloads to the last segment of the object name", async () => {
    transport.enqueue({ body: "meow" });

    await new GetObjectCommand("Download an object", client, context(["photos", "2024/cat.txt"])).run();

    const target = path.join(dir, "cat.txt");
    expect(await fs.readFile(target, "utf-8")).toBe("meow");
    expect(logger.info).toHaveBeenCalledWith(`File downloaded locally to ${target}`);
  });

  it("prints metadata as status line and headers", async () => {
    transport.enqueue({ headers: { etag: '"abc"' } });

    await new GetObjectMetadataCommand("Get object metadata", client, context(["photos", "a.txt"])).run();

    expect(transport.lastRequest()?.method).toBe("HEAD");
    expect(logger.info).toHaveBeenCalledWith('200 OK\netag: "abc"');
  });

  describe("upload", () => {
    it("creates and uploads the test file for a blank path", async () => {
      transport.enqueue({});

      await new InsertObjectCommand("Upload an object", client, context(["", "photos", "", "", "", ""])).run();

      const file = path.join(dir, UPLOAD_FILE_NAME);
      expect(await fs.readFile(file, "utf-8")).toBe(UPLOAD_FILE_CONTENT);

      const request = transport.lastRequest();
      expect(request?.url).toBe(`http://photos.storage.googleapis.com/${UPLOAD_FILE_NAME}`);
      expect(request?.headers["Content-Type"]).toBe("text/plain");
      expect(request?.headers["Content-Length"]).toBe("47");
      expect(bodyOf(0)).toBe(UPLOAD_FILE_CONTENT);
      expect(logger.info).toHaveBeenCalledWith(`File ${file} was uploaded.`);
    });

    it("falls back to the test file when the path is missing", async () => {
      transport.enqueue({});
      const missing = path.join(dir, "absent.bin");

      await new InsertObjectCommand("Upload an object", client, context([missing, "photos", "", "", "", ""])).run();

      expect(logger.error).toHaveBeenCalledWith(`File does not exist, creating ${UPLOAD_FILE_NAME} file.`);
      expect(transport.lastRequest()?.url).toBe(`http://photos.storage.googleapis.com/${UPLOAD_FILE_NAME}`);
    });

    it("uses the given name, type and ACL", async () => {
      transport.enqueue({});
      const file = path.join(dir, "report.json");
      await fs.writeFile(file, "{}");

      await new InsertObjectCommand(
        "Upload an object",
        client,
        context([file, "photos", "renamed.dat", "application/json", "", "public-read"])
      ).run();

      const request = transport.lastRequest();
      expect(request?.url).toBe("http://photos.storage.googleapis.com/renamed.dat");
      expect(request?.headers["Content-Type"]).toBe("application/json");
      expect(request?.headers["Content-Encoding"]).toBeUndefined();
      expect(request?.headers["x-goog-acl"]).toBe("public-read");
    });
  });

  it("copies under the source name by default", async () => {
    transport.enqueue({});

    await new CopyObjectCommand("Copy an object", client, context(["src", "a.txt", "dst", ""])).run();

    expect(transport.lastRequest()?.url).toBe("http://dst.storage.googleapis.com/a.txt");
    expect(logger.info).toHaveBeenCalledWith("a.txt has been copied to dst.");
  });

  it("reports deleted objects", async () => {
    transport.enqueue({});

    await new DeleteObjectCommand("Delete an object", client, context(["photos", "a.txt"])).run();

    expect(transport.lastRequest()?.method).toBe("DELETE");
    expect(logger.info).toHaveBeenCalledWith("a.txt deleted.");
  });

  it("lists every command in menu order", () => {
    expect(createCommands(client, context([])).map((command) => command.description)).toEqual([
      "Get all buckets",
      "Get a bucket",
      "Get bucket CORS",
      "Get bucket location",
      "Create a bucket",
      "Set bucket CORS",
      "Delete a bucket",
      "Download an object",
      "Get object ACLs",
      "Get object metadata",
      "Upload an object",
      "Copy an object",
      "Delete an object",
    ]);
  });
});

describe("formatEnvelope", () => {
  it("renders the status line alone when there are no headers", () => {
    expect(formatEnvelope({ status: 204, statusText: "No Content", headers: {} })).toBe("204 No Content");
  });
});
