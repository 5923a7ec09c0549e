import { createPrivateKey } from 'crypto';
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { GoogleAuth, JWT, OAuth2Client, UserRefreshClient } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { describeError, log } from '../logging.js';
import { loadClientSecrets } from './client.js';
import type { ClientSecrets } from './client.js';
import { fatal, skipped, succeeded } from './credential.js';
import type { AuthMethod, Credential, CredentialStrategy, StrategyOutcome } from './credential.js';
import { AuthServer } from './server.js';
import {
  DEFAULT_TOKEN_URI,
  TokenCache,
  isTokenRefreshable,
  isTokenValid,
  mergeCredentials,
  parseExpiry,
} from './tokenCache.js';
import type { AuthorizedUserToken } from './tokenCache.js';

const ServiceAccountKeySchema = z
  .object({
    type: z.literal('service_account'),
    client_email: z.string().min(1, 'client_email is required'),
    private_key: z.string().min(1, 'private_key is required'),
    private_key_id: z.string().optional(),
  })
  .passthrough();

/**
 * Collaborators the strategies need from the outside world. Tests replace
 * these with fakes; the defaults talk to google-auth-library, the filesystem
 * and the user's browser.
 */
export interface StrategyDependencies {
  tokenCache: TokenCache;
  fileExists(path: string): boolean;
  readTextFile(path: string): Promise<string>;
  loadClientSecrets(path: string): Promise<ClientSecrets>;
  loadDefaultCredential(scopes: readonly string[]): Promise<Credential>;
  refreshUserToken(token: AuthorizedUserToken): Promise<AuthorizedUserToken>;
  runConsentFlow(secrets: ClientSecrets, scopes: readonly string[]): Promise<Credentials>;
}

/**
 * Build a JWT credential from a service-account key. The private key is parsed
 * here, since JWT itself only reads it when the first token is signed.
 *
 * @throws when the key JSON is incomplete or `private_key` is not a PEM key
 */
export function createServiceAccountCredential(info: unknown, scopes: readonly string[]): Credential {
  const key = ServiceAccountKeySchema.parse(info);
  try {
    createPrivateKey(key.private_key);
  } catch (error) {
    throw new Error(`private_key is not a valid PEM private key: ${describeError(error)}`);
  }
  const client = new JWT({
    email: key.client_email,
    key: key.private_key,
    keyId: key.private_key_id,
    scopes: [...scopes],
  });
  return { client, principal: 'service-account', scopes, refreshable: true };
}

export function createUserCredential(token: AuthorizedUserToken, scopes: readonly string[]): Credential {
  const expiry = parseExpiry(token);
  const grantedScopes = token.scopes && token.scopes.length > 0 ? token.scopes : scopes;
  const client = new OAuth2Client(token.client_id, token.client_secret || undefined);
  client.setCredentials({
    access_token: token.token ?? null,
    refresh_token: token.refresh_token ?? null,
    expiry_date: expiry ? expiry.getTime() : null,
    scope: grantedScopes.join(' '),
    token_type: 'Bearer',
  });
  return {
    client,
    principal: 'user',
    scopes: grantedScopes,
    expiry,
    refreshable: isTokenRefreshable(token),
  };
}

async function loadDefaultCredential(scopes: readonly string[]): Promise<Credential> {
  const auth = new GoogleAuth({ scopes: [...scopes] });
  const client = await auth.getClient();
  return {
    client: auth,
    principal: client instanceof UserRefreshClient ? 'user' : 'service-account',
    scopes,
    refreshable: true,
  };
}

async function refreshUserToken(token: AuthorizedUserToken): Promise<AuthorizedUserToken> {
  const client = new OAuth2Client(token.client_id, token.client_secret || undefined);
  client.setCredentials({ refresh_token: token.refresh_token ?? null });
  // With no access token set, getAccessToken always goes to the token endpoint.
  const { token: accessToken } = await client.getAccessToken();
  if (!accessToken) {
    throw new Error('Token refresh returned no access token');
  }
  return mergeCredentials(token, client.credentials, token.scopes ?? []);
}

export function createDefaultDependencies(config: AppConfig): StrategyDependencies {
  return {
    tokenCache: new TokenCache(config.tokenPath),
    fileExists: existsSync,
    readTextFile: (path) => readFile(path, 'utf-8'),
    loadClientSecrets,
    loadDefaultCredential,
    refreshUserToken,
    runConsentFlow: (secrets, scopes) => new AuthServer(secrets, scopes).authorize(),
  };
}

function serviceAccountOutcome(keyJson: string, scopes: readonly string[], method: AuthMethod): StrategyOutcome {
  try {
    return succeeded(createServiceAccountCredential(JSON.parse(keyJson), scopes), method);
  } catch (error) {
    return skipped(`invalid service account key: ${describeError(error)}`);
  }
}

export function createEncodedServiceAccountStrategy(config: AppConfig): CredentialStrategy {
  return {
    name: 'Base64 service account (CREDENTIALS_CONFIG)',
    async attempt() {
      if (!config.encodedServiceAccount) {
        return skipped('CREDENTIALS_CONFIG is not set');
      }
      const decoded = Buffer.from(config.encodedServiceAccount, 'base64').toString('utf-8');
      return serviceAccountOutcome(decoded, config.scopes, 'encoded-service-account');
    },
  };
}

export function createServiceAccountFileStrategy(
  config: AppConfig,
  deps: StrategyDependencies
): CredentialStrategy {
  return {
    name: `Service account file (${config.serviceAccountPath})`,
    async attempt() {
      if (!deps.fileExists(config.serviceAccountPath)) {
        return skipped('file not found');
      }
      const content = await deps.readTextFile(config.serviceAccountPath);
      return serviceAccountOutcome(content, config.scopes, 'service-account-file');
    },
  };
}

export function createApplicationDefaultStrategy(
  config: AppConfig,
  deps: StrategyDependencies
): CredentialStrategy {
  return {
    name: 'Application Default Credentials',
    async attempt() {
      const credential = await deps.loadDefaultCredential(config.scopes);
      return succeeded(credential, 'application-default');
    },
  };
}

export function createCachedTokenStrategy(
  config: AppConfig,
  deps: StrategyDependencies
): CredentialStrategy {
  return {
    name: `Cached OAuth token (${deps.tokenCache.getTokenPath()})`,
    async attempt() {
      const token = await deps.tokenCache.load();
      if (!token) {
        return skipped('no cached token');
      }
      if (isTokenValid(token)) {
        return succeeded(createUserCredential(token, config.scopes), 'cached-user-token');
      }
      if (!isTokenRefreshable(token)) {
        return skipped('cached token is expired and has no refresh token');
      }
      const refreshed = await deps.refreshUserToken(token);
      try {
        await deps.tokenCache.save(refreshed);
      } catch (error) {
        log('Could not persist refreshed OAuth token', {
          tokenPath: deps.tokenCache.getTokenPath(),
          error: describeError(error),
        });
      }
      return succeeded(createUserCredential(refreshed, config.scopes), 'refreshed-user-token');
    },
  };
}

export function createInteractiveFlowStrategy(
  config: AppConfig,
  deps: StrategyDependencies
): CredentialStrategy {
  return {
    name: `Interactive OAuth (${config.credentialsPath})`,
    async attempt() {
      if (!deps.fileExists(config.credentialsPath)) {
        return fatal(`OAuth client secrets file not found at ${config.credentialsPath}`);
      }

      let secrets: ClientSecrets;
      try {
        secrets = await deps.loadClientSecrets(config.credentialsPath);
      } catch (error) {
        return fatal(`Could not read OAuth client secrets: ${describeError(error)}`);
      }

      let tokens: Credentials;
      try {
        tokens = await deps.runConsentFlow(secrets, config.scopes);
      } catch (error) {
        return fatal(`OAuth flow failed: ${describeError(error)}`);
      }

      const token = mergeCredentials(
        {
          client_id: secrets.client_id,
          client_secret: secrets.client_secret,
          token_uri: secrets.token_uri ?? DEFAULT_TOKEN_URI,
        },
        tokens,
        config.scopes
      );

      try {
        await deps.tokenCache.save(token);
      } catch (error) {
        // The credential is still good for this process; only the next startup
        // loses the cache.
        log('Could not persist OAuth token', {
          tokenPath: deps.tokenCache.getTokenPath(),
          error: describeError(error),
        });
      }

      return succeeded(createUserCredential(token, config.scopes), 'interactive-user-flow');
    },
  };
}

/**
 * Strategies in priority order: inline service account, service-account
 * file, ambient default credentials, cached user token, interactive consent.
 */
export function createDefaultStrategies(
  config: AppConfig,
  overrides: Partial<StrategyDependencies> = {}
): CredentialStrategy[] {
  const deps: StrategyDependencies = { ...createDefaultDependencies(config), ...overrides };
  return [
    createEncodedServiceAccountStrategy(config),
    createServiceAccountFileStrategy(config, deps),
    createApplicationDefaultStrategy(config, deps),
    createCachedTokenStrategy(config, deps),
    createInteractiveFlowStrategy(config, deps),
  ];
}
