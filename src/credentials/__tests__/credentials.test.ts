/**
 * Tests for OAuth2 credential providers
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { AuthenticationError, ConfigurationError } from "../../error/index.js";
import { MockTransport } from "../../simulation/index.js";
import {
  AccessTokenAuthProvider,
  TOKEN_ENDPOINT,
  UserCredentialsAuthProvider,
  createAuthProvider,
  loadAuthorizedUserFile,
} from "../index.js";

const CREDENTIALS = {
  client_id: "test-client",
  client_secret: "test-secret",
  refresh_token: "test-refresh",
};

function tokenReply(token: string, expiresIn: number) {
  return { status: 200, body: JSON.stringify({ access_token: token, expires_in: expiresIn, token_type: "Bearer" }) };
}

describe("AccessTokenAuthProvider", () => {
  it("returns the static token", async () => {
    const provider = new AccessTokenAuthProvider("test-token");
    await provider.refreshToken();
    expect(await provider.getAccessToken()).toBe("test-token");
    expect(provider.isTokenValid()).toBe(true);
  });

  it("treats an empty token as invalid", () => {
    expect(new AccessTokenAuthProvider("").isTokenValid()).toBe(false);
  });
});

describe("UserCredentialsAuthProvider", () => {
  let transport: MockTransport;
  let now: number;
  let provider: UserCredentialsAuthProvider;

  beforeEach(() => {
    transport = new MockTransport();
    now = 1_000_000;
    provider = new UserCredentialsAuthProvider(CREDENTIALS, transport, () => now);
  });

  it("posts a refresh-token grant", async () => {
    transport.enqueue(tokenReply("access-1", 3600));

    expect(await provider.getAccessToken()).toBe("access-1");

    const request = transport.lastRequest();
    expect(request?.method).toBe("POST");
    expect(request?.url).toBe(TOKEN_ENDPOINT);
    expect(request?.headers).toEqual({ "Content-Type": "application/x-www-form-urlencoded" });
    expect(request?.body).toBe(
      "client_id=test-client&client_secret=test-secret&refresh_token=test-refresh&grant_type=refresh_token"
    );
  });

  it("caches the token until 60 seconds before expiry", async () => {
    transport.enqueue(tokenReply("access-1", 3600)).enqueue(tokenReply("access-2", 3600));

    await provider.getAccessToken();
    now += 3539_000;
    expect(await provider.getAccessToken()).toBe("access-1");
    expect(provider.isTokenValid()).toBe(true);

    now += 1_000;
    expect(provider.isTokenValid()).toBe(false);
    expect(await provider.getAccessToken()).toBe("access-2");
    expect(transport.requests).toHaveLength(2);
  });

  it("shares one refresh between concurrent callers", async () => {
    transport.enqueue(tokenReply("access-1", 3600));

    const tokens = await Promise.all([provider.getAccessToken(), provider.getAccessToken()]);

    expect(tokens).toEqual(["access-1", "access-1"]);
    expect(transport.requests).toHaveLength(1);
  });

  it("forces a new token on refreshToken", async () => {
    transport.enqueue(tokenReply("access-1", 3600)).enqueue(tokenReply("access-2", 3600));

    await provider.getAccessToken();
    await provider.refreshToken();

    expect(await provider.getAccessToken()).toBe("access-2");
  });

  it("raises AuthenticationError on a rejected grant", async () => {
    transport.enqueue({ status: 400, statusText: "Bad Request", body: '{"error":"invalid_grant"}' });

    const failure = provider.getAccessToken();

    await expect(failure).rejects.toThrow(AuthenticationError);
    await expect(failure).rejects.toThrow('Token refresh failed: 400 {"error":"invalid_grant"}');
  });

  it("raises AuthenticationError on a malformed token response", async () => {
    transport.enqueue({ status: 200, body: "<html>" }).enqueue({ status: 200, body: '{"expires_in":3600}' });

    await expect(provider.getAccessToken()).rejects.toThrow("Token refresh returned a non-JSON body");
    await expect(provider.getAccessToken()).rejects.toThrow("Token refresh response is missing access_token");
  });
});

describe("loadAuthorizedUserFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "storage-credentials-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads an authorized-user file", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(file, JSON.stringify({ ...CREDENTIALS, type: "authorized_user" }));

    expect(await loadAuthorizedUserFile(file)).toEqual(CREDENTIALS);
  });

  it("rejects invalid JSON", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(file, "not json");

    await expect(loadAuthorizedUserFile(file)).rejects.toThrow(`Credentials file ${file} is not valid JSON`);
  });

  it("rejects files missing fields", async () => {
    const file = path.join(dir, "credentials.json");
    await fs.writeFile(file, JSON.stringify({ client_id: "test-client" }));

    await expect(loadAuthorizedUserFile(file)).rejects.toThrow(ConfigurationError);
  });

  it("rejects missing files", async () => {
    await expect(loadAuthorizedUserFile(path.join(dir, "absent.json"))).rejects.toThrow(/^Cannot read credentials file/);
  });
});

describe("createAuthProvider", () => {
  it("builds the provider matching the credential type", async () => {
    const transport = new MockTransport();

    expect(await createAuthProvider({ type: "access_token", token: "test-token" }, transport)).toBeInstanceOf(
      AccessTokenAuthProvider
    );
    expect(await createAuthProvider({ type: "authorized_user", credentials: CREDENTIALS }, transport)).toBeInstanceOf(
      UserCredentialsAuthProvider
    );
  });
});
