import type { GoogleAuth, OAuth2Client } from 'google-auth-library';

/** How a credential was obtained. Used for diagnostics only. */
export type AuthMethod =
  | 'encoded-service-account'
  | 'service-account-file'
  | 'application-default'
  | 'cached-user-token'
  | 'refreshed-user-token'
  | 'interactive-user-flow';

export type PrincipalType = 'service-account' | 'user';

/** Anything googleapis accepts as `auth` for a service client. */
export type ApiAuthClient = OAuth2Client | GoogleAuth;

export interface Credential {
  client: ApiAuthClient;
  principal: PrincipalType;
  scopes: readonly string[];
  expiry?: Date;
  refreshable: boolean;
}

export interface ResolvedCredential {
  credential: Credential;
  method: AuthMethod;
}

export type StrategyOutcome =
  | { status: 'succeeded'; credential: Credential; method: AuthMethod }
  | { status: 'skipped'; reason: string }
  | { status: 'fatal'; reason: string };

/**
 * One self-contained way of obtaining a credential. `attempt` reports its own
 * failures as outcomes; anything it throws is treated as a skip.
 */
export interface CredentialStrategy {
  readonly name: string;
  attempt(): Promise<StrategyOutcome>;
}

export function succeeded(credential: Credential, method: AuthMethod): StrategyOutcome {
  return { status: 'succeeded', credential, method };
}

export function skipped(reason: string): StrategyOutcome {
  return { status: 'skipped', reason };
}

export function fatal(reason: string): StrategyOutcome {
  return { status: 'fatal', reason };
}
