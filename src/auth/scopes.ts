// OAuth scopes for Google Sheets and the Drive operations the tools rely on
// (listing spreadsheets, folder placement, sharing).
export const SPREADSHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';
export const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

export const DEFAULT_SCOPES: readonly string[] = [SPREADSHEETS_SCOPE, DRIVE_SCOPE];

export const SCOPE_DESCRIPTIONS: Record<string, string> = {
  'https://www.googleapis.com/auth/spreadsheets': 'Read and write Google Sheets',
  'https://www.googleapis.com/auth/spreadsheets.readonly': 'Read-only access to Google Sheets',
  'https://www.googleapis.com/auth/drive': 'Full access to Google Drive',
  'https://www.googleapis.com/auth/drive.file': 'Access to files created or opened by this app',
  'https://www.googleapis.com/auth/drive.readonly': 'Read-only access to Google Drive',
};

/**
 * Parse a comma or whitespace separated scope list. Short names such as
 * `spreadsheets` or `drive.file` are expanded to full scope URLs.
 */
export function parseScopes(value: string): string[] {
  const scopes = value
    .split(/[\s,]+/)
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0)
    .map((scope) => (scope.startsWith('https://') ? scope : `https://www.googleapis.com/auth/${scope}`));
  return [...new Set(scopes)];
}

export function describeScopes(scopes: readonly string[]): Record<string, string> {
  return Object.fromEntries(
    scopes.map((scope) => [scope, SCOPE_DESCRIPTIONS[scope] ?? 'Unknown scope'])
  );
}
