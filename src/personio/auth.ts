/**
 * Personio access token management.
 * Caches one credential in memory and refreshes it shortly before expiry.
 * Concurrent callers that detect expiry share a single in-flight exchange.
 */

import { z } from "zod";
import type { Logger } from "pino";
import { AuthenticationError, errorMessage } from "../errors.js";
import type { Credential } from "./types.js";

/** Refresh token when access token has less than this many ms until expiry. */
export const REFRESH_TOKEN_BUFFER_MS = 60 * 1000;

/** Used when the auth response does not state a lifetime. */
const DEFAULT_TOKEN_LIFETIME_S = 3600;

const tokenResponseSchema = z.object({
  success: z.boolean().optional(),
  data: z.object({
    token: z.string().min(1),
    expires_in: z.number().int().positive().optional(),
  }),
});

/** What the gateway needs from a token provider. */
export interface TokenSource {
  getValidToken(): Promise<Credential>;
  forceRefresh(staleToken?: string): Promise<Credential>;
}

export interface TokenProviderOptions {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Clock override for tests. */
  now?: () => number;
}

export class TokenProvider implements TokenSource {
  private credential: Credential | undefined;
  /** In-flight refresh de-dupe. */
  private refreshInFlight: Promise<Credential> | undefined;
  private readonly now: () => number;

  constructor(private readonly options: TokenProviderOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the cached credential, exchanging client credentials for a new one
   * when it expires within REFRESH_TOKEN_BUFFER_MS.
   */
  async getValidToken(): Promise<Credential> {
    const current = this.credential;
    if (current && this.now() < current.expiresAt - REFRESH_TOKEN_BUFFER_MS) {
      return current;
    }
    return this.refresh();
  }

  /**
   * Force a refresh after the API rejected `staleToken`. When another caller
   * already replaced that token, the newer credential is returned as is.
   */
  async forceRefresh(staleToken?: string): Promise<Credential> {
    const current = this.credential;
    if (current && staleToken !== undefined && current.accessToken !== staleToken) {
      return current;
    }
    return this.refresh();
  }

  private refresh(): Promise<Credential> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.exchange().finally(() => {
        this.refreshInFlight = undefined;
      });
    }
    return this.refreshInFlight;
  }

  private async exchange(): Promise<Credential> {
    const { clientId, clientSecret, baseUrl, timeoutMs, logger } = this.options;
    const url = `${baseUrl}/v1/auth`;

    logger.info("Authenticating with Personio API");

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ client_id: clientId, client_secret: clientSecret }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new AuthenticationError(`Personio auth request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new AuthenticationError(`Personio auth request failed: ${res.status} ${text}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new AuthenticationError("Personio auth response was not valid JSON");
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success || parsed.data.success === false) {
      throw new AuthenticationError(
        `Personio auth response did not match expected shape: ${
          parsed.success ? "success=false" : parsed.error.message
        }`
      );
    }

    const lifetimeS = parsed.data.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_S;
    const credential: Credential = {
      accessToken: parsed.data.data.token,
      expiresAt: this.now() + lifetimeS * 1000,
    };
    this.credential = credential;
    logger.info({ expiresAt: new Date(credential.expiresAt).toISOString() }, "Authenticated");
    return credential;
  }
}
