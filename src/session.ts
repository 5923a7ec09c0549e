import { google } from 'googleapis';
import type { drive_v3, sheets_v4 } from 'googleapis';
import type { AuthMethod, PrincipalType, ResolvedCredential } from './auth/credential.js';
import type { AppConfig } from './config.js';

export interface AuthSummary {
  method: AuthMethod;
  principal: PrincipalType;
  scopes: readonly string[];
  expiry: Date | null;
  refreshable: boolean;
}

/**
 * API clients and static settings shared by every tool call. Built once at
 * startup and never mutated afterwards.
 */
export interface SessionContext {
  readonly sheets: sheets_v4.Sheets;
  readonly drive: drive_v3.Drive;
  readonly folderId: string | null;
  readonly auth: Readonly<AuthSummary>;
}

export function createSessionContext(
  resolved: ResolvedCredential,
  config: Pick<AppConfig, 'folderId'>
): SessionContext {
  const { credential, method } = resolved;
  return Object.freeze({
    sheets: google.sheets({ version: 'v4', auth: credential.client }),
    drive: google.drive({ version: 'v3', auth: credential.client }),
    folderId: config.folderId,
    auth: Object.freeze({
      method,
      principal: credential.principal,
      scopes: Object.freeze([...credential.scopes]),
      expiry: credential.expiry ?? null,
      refreshable: credential.refreshable,
    }),
  });
}
