import { resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_SCOPES, parseScopes } from './auth/scopes.js';

// -----------------------------------------------------------------------------
// CONSTANTS & CONFIG
// -----------------------------------------------------------------------------
export const DEFAULT_SERVICE_ACCOUNT_PATH = 'service_account.json';
export const DEFAULT_TOKEN_PATH = 'token.json';
export const DEFAULT_CREDENTIALS_PATH = 'credentials.json';

export interface AppConfig {
  /** Base64-encoded service-account key JSON. */
  encodedServiceAccount: string | null;
  serviceAccountPath: string;
  tokenPath: string;
  /** OAuth client-secret file used by the interactive consent flow. */
  credentialsPath: string;
  /** Folder that `list_spreadsheets` and `create_spreadsheet` are scoped to. */
  folderId: string | null;
  scopes: readonly string[];
}

// Empty strings are treated as unset, matching how shells and MCP client
// configs commonly pass "no value".
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? null : value.trim()));

const EnvSchema = z.object({
  CREDENTIALS_CONFIG: optionalString,
  SERVICE_ACCOUNT_PATH: optionalString,
  TOKEN_PATH: optionalString,
  CREDENTIALS_PATH: optionalString,
  DRIVE_FOLDER_ID: optionalString,
  GOOGLE_SCOPES: optionalString,
});

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.parse(env);
  const scopes = parsed.GOOGLE_SCOPES ? parseScopes(parsed.GOOGLE_SCOPES) : [...DEFAULT_SCOPES];

  return {
    encodedServiceAccount: parsed.CREDENTIALS_CONFIG,
    serviceAccountPath: resolve(cwd, parsed.SERVICE_ACCOUNT_PATH ?? DEFAULT_SERVICE_ACCOUNT_PATH),
    tokenPath: resolve(cwd, parsed.TOKEN_PATH ?? DEFAULT_TOKEN_PATH),
    credentialsPath: resolve(cwd, parsed.CREDENTIALS_PATH ?? DEFAULT_CREDENTIALS_PATH),
    folderId: parsed.DRIVE_FOLDER_ID,
    scopes: scopes.length > 0 ? scopes : [...DEFAULT_SCOPES],
  };
}
