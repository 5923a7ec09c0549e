import { existsSync } from 'fs';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Credentials } from 'google-auth-library';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

export const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';

// Matches google-auth-library's eager refresh window: a token this close to
// expiry is treated as expired.
export const EXPIRY_THRESHOLD_MS = 5 * 60 * 1000;

/**
 * Authorized-user token in the serialization shared by Google's OAuth client
 * libraries. Unknown fields are kept so a rewrite preserves them.
 */
export const AuthorizedUserTokenSchema = z
  .object({
    token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    token_uri: z.string().optional(),
    client_id: z.string().min(1, 'client_id is required'),
    client_secret: z.string(),
    scopes: z.array(z.string()).nullish(),
    expiry: z.string().nullish(),
  })
  .passthrough();

export type AuthorizedUserToken = z.infer<typeof AuthorizedUserTokenSchema>;

export function parseExpiry(token: AuthorizedUserToken): Date | undefined {
  if (!token.expiry) {
    return undefined;
  }
  const timestamp = Date.parse(token.expiry);
  return Number.isNaN(timestamp) ? new Date(0) : new Date(timestamp);
}

/** True when the access token is present and not about to expire. */
export function isTokenValid(token: AuthorizedUserToken, now: number = Date.now()): boolean {
  if (!token.token) {
    return false;
  }
  const expiry = parseExpiry(token);
  return expiry === undefined || expiry.getTime() - now > EXPIRY_THRESHOLD_MS;
}

export function isTokenRefreshable(token: AuthorizedUserToken): boolean {
  return typeof token.refresh_token === 'string' && token.refresh_token.length > 0;
}

/**
 * Merge credentials returned by an OAuth exchange or refresh into the cached
 * representation. Fields the response does not carry keep their old values.
 */
export function mergeCredentials(
  base: AuthorizedUserToken,
  credentials: Credentials,
  fallbackScopes: readonly string[]
): AuthorizedUserToken {
  return {
    ...base,
    token: credentials.access_token ?? base.token ?? null,
    refresh_token: credentials.refresh_token ?? base.refresh_token ?? null,
    token_uri: base.token_uri ?? DEFAULT_TOKEN_URI,
    scopes: credentials.scope ? credentials.scope.split(' ') : base.scopes ?? [...fallbackScopes],
    expiry: credentials.expiry_date ? new Date(credentials.expiry_date).toISOString() : base.expiry ?? null,
  };
}

/**
 * Reads and writes the cached user token. The file holds a refresh token and
 * is written with owner-only permissions.
 */
export class TokenCache {
  constructor(private readonly tokenPath: string) {}

  getTokenPath(): string {
    return this.tokenPath;
  }

  exists(): boolean {
    return existsSync(this.tokenPath);
  }

  /** Returns null when no cache file exists; throws when it cannot be parsed. */
  async load(): Promise<AuthorizedUserToken | null> {
    if (!this.exists()) {
      return null;
    }
    const content = await readFile(this.tokenPath, 'utf-8');
    return AuthorizedUserTokenSchema.parse(JSON.parse(content));
  }

  /**
   * Write to a temporary file beside the cache and rename it into place, so a
   * crash mid-write leaves the previous cache intact.
   */
  async save(token: AuthorizedUserToken): Promise<void> {
    const directory = dirname(this.tokenPath);
    const tempPath = join(directory, `.${basename(this.tokenPath)}.${uuidv4()}.tmp`);

    await mkdir(directory, { recursive: true });
    await writeFile(tempPath, JSON.stringify(token), { mode: 0o600 });
    try {
      await rename(tempPath, this.tokenPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async clear(): Promise<void> {
    await rm(this.tokenPath, { force: true });
  }
}
