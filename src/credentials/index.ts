/**
 * Credentials Provider
 *
 * OAuth2 bearer tokens for the authorizing transport.
 */

import * as fs from "fs/promises";
import { z } from "zod";
import { AuthenticationError, ConfigurationError } from "../error/index.js";
import type { HttpTransport } from "../transport/index.js";

export const TOKEN_ENDPOINT = "https://oauth2.googleapis.com/token";

/**
 * Seconds shaved off a token's lifetime so it is never used at the edge of
 * expiry.
 */
const EXPIRY_MARGIN_SEC = 60;

/**
 * Authorized-user credentials (client id/secret and a refresh token).
 */
export interface AuthorizedUserCredentials {
  client_id: string;
  client_secret: string;
  refresh_token: string;
}

/**
 * Credentials configuration.
 */
export type Credentials =
  | { type: "access_token"; token: string }
  | { type: "authorized_user"; credentials: AuthorizedUserCredentials }
  | { type: "authorized_user_file"; file: string };

/**
 * Cached access token.
 */
export interface CachedToken {
  token: string;
  expiresAt: Date;
}

const AuthorizedUserSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  token_type: z.string().optional(),
});

/**
 * Authentication provider interface.
 */
export interface AuthProvider {
  /**
   * Get a valid access token.
   */
  getAccessToken(): Promise<string>;

  /**
   * Force refresh the access token.
   */
  refreshToken(): Promise<void>;

  /**
   * Check if the current token is valid.
   */
  isTokenValid(): boolean;
}

/**
 * Create an auth provider from credentials configuration.
 *
 * @param credentials - The credentials configuration
 * @param transport - Unauthenticated transport used for token refreshes
 *
 * @example
 * ```typescript
 * const provider = await createAuthProvider(
 *   { type: "authorized_user_file", file: "./credentials.json" },
 *   new FetchTransport()
 * );
 * ```
 */
export async function createAuthProvider(
  credentials: Credentials,
  transport: HttpTransport
): Promise<AuthProvider> {
  switch (credentials.type) {
    case "access_token":
      return new AccessTokenAuthProvider(credentials.token);

    case "authorized_user":
      return new UserCredentialsAuthProvider(credentials.credentials, transport);

    case "authorized_user_file":
      return new UserCredentialsAuthProvider(await loadAuthorizedUserFile(credentials.file), transport);
  }
}

/**
 * Read and validate an authorized-user JSON file.
 */
export async function loadAuthorizedUserFile(file: string): Promise<AuthorizedUserCredentials> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read credentials file ${file}: ${detail}`, "InvalidCredentials");
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new ConfigurationError(`Credentials file ${file} is not valid JSON`, "InvalidCredentials");
  }

  const parsed = AuthorizedUserSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Credentials file ${file} must contain client_id, client_secret and refresh_token`,
      "InvalidCredentials",
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Access token authentication provider.
 *
 * Uses an explicit access token obtained elsewhere.
 */
export class AccessTokenAuthProvider implements AuthProvider {
  private token: string;

  constructor(token: string) {
    this.token = token;
  }

  async getAccessToken(): Promise<string> {
    return this.token;
  }

  async refreshToken(): Promise<void> {
    // Cannot refresh static token
    return;
  }

  isTokenValid(): boolean {
    return this.token.length > 0;
  }
}

/**
 * User credentials auth provider.
 *
 * Exchanges a stored refresh token for access tokens and caches them until
 * shortly before they expire.
 */
export class UserCredentialsAuthProvider implements AuthProvider {
  private readonly credentials: AuthorizedUserCredentials;
  private readonly transport: HttpTransport;
  private readonly now: () => number;
  private cachedToken?: CachedToken;
  private pending: Promise<CachedToken> | null = null;

  constructor(credentials: AuthorizedUserCredentials, transport: HttpTransport, now: () => number = Date.now) {
    this.credentials = credentials;
    this.transport = transport;
    this.now = now;
  }

  async getAccessToken(): Promise<string> {
    if (this.cachedToken && !this.isExpired(this.cachedToken)) {
      return this.cachedToken.token;
    }

    // Avoid concurrent token refreshes
    if (!this.pending) {
      this.pending = this.performRefresh().finally(() => {
        this.pending = null;
      });
    }

    const token = await this.pending;
    return token.token;
  }

  async refreshToken(): Promise<void> {
    this.cachedToken = undefined;
    await this.getAccessToken();
  }

  isTokenValid(): boolean {
    return this.cachedToken !== undefined && !this.isExpired(this.cachedToken);
  }

  private async performRefresh(): Promise<CachedToken> {
    const body = new URLSearchParams({
      client_id: this.credentials.client_id,
      client_secret: this.credentials.client_secret,
      refresh_token: this.credentials.refresh_token,
      grant_type: "refresh_token",
    });

    const response = await this.transport.send({
      method: "POST",
      url: TOKEN_ENDPOINT,
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: body.toString(),
    });

    if (response.status >= 300) {
      throw new AuthenticationError(
        `Token refresh failed: ${response.status} ${response.body.toString()}`,
        "TokenRefreshFailed",
        { statusCode: response.status }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body.toString());
    } catch {
      throw new AuthenticationError("Token refresh returned a non-JSON body", "TokenRefreshFailed");
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthenticationError("Token refresh response is missing access_token", "TokenRefreshFailed");
    }

    const cached: CachedToken = {
      token: parsed.data.access_token,
      expiresAt: new Date(this.now() + (parsed.data.expires_in - EXPIRY_MARGIN_SEC) * 1000),
    };
    this.cachedToken = cached;
    return cached;
  }

  private isExpired(cached: CachedToken): boolean {
    return cached.expiresAt.getTime() <= this.now();
  }
}
