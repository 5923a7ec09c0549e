import { describeError } from '../logging.js';
import { adaptTool } from './registry.js';
import type { RegisteredTool } from './registry.js';
import { ListSpreadsheetsSchema, ShareSpreadsheetSchema } from './schemas.js';

export const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';
export const SHARE_ROLES = ['reader', 'commenter', 'writer'] as const;

type ShareRole = typeof SHARE_ROLES[number];

const SHARE_ROLE_SET: ReadonlySet<string> = new Set(SHARE_ROLES);

function isShareRole(role: string): role is ShareRole {
  return SHARE_ROLE_SET.has(role);
}

export function buildSpreadsheetQuery(folderId: string | null): string {
  let query = `mimeType='${SPREADSHEET_MIME_TYPE}' and trashed = false`;
  if (folderId) {
    query += ` and '${folderId}' in parents`;
  }
  return query;
}

export const listSpreadsheets = adaptTool({
  name: 'list_spreadsheets',
  description: "List spreadsheets in the configured Google Drive folder, or in 'My Drive' when no folder is configured. Most recently modified first.",
  inputSchema: {
    type: 'object',
    properties: {},
  },
  argsSchema: ListSpreadsheetsSchema,
  returns: 'mapping',
  async handler(_args, { session }) {
    const response = await session.drive.files.list({
      q: buildSpreadsheetQuery(session.folderId),
      spaces: 'drive',
      fields: 'files(id, name)',
      orderBy: 'modifiedTime desc',
      supportsAllDrives: true,
      includeItemsFromAllDrives: true,
    });
    return {
      spreadsheets: (response.data.files ?? []).map((file) => ({
        id: file.id ?? '',
        title: file.name ?? '',
      })),
    };
  },
});

interface ShareSuccess {
  email_address: string;
  role: ShareRole;
  permissionId: string | null;
}

interface ShareFailure {
  email_address: string | null;
  error: string;
}

export const shareSpreadsheet = adaptTool({
  name: 'share_spreadsheet',
  description: 'Share a Google Spreadsheet with multiple users via email, assigning specific roles. Recipients that fail are reported in "failures" without stopping the others.',
  inputSchema: {
    type: 'object',
    properties: {
      spreadsheet_id: { type: 'string', description: 'The ID of the spreadsheet to share' },
      recipients: {
        type: 'array',
        description: "List of recipients with 'email_address' and 'role' keys. Role is one of reader, commenter, writer (defaults to writer).",
        items: {
          type: 'object',
          properties: {
            email_address: { type: 'string' },
            role: { type: 'string', enum: [...SHARE_ROLES] },
          },
          required: ['email_address'],
        },
      },
      send_notification: { type: 'boolean', description: 'Whether to send notification emails. Defaults to true.' },
    },
    required: ['spreadsheet_id', 'recipients'],
  },
  argsSchema: ShareSpreadsheetSchema,
  returns: 'mapping',
  async handler(args, { session }) {
    const successes: ShareSuccess[] = [];
    const failures: ShareFailure[] = [];

    for (const recipient of args.recipients) {
      const email = recipient.email_address;
      const role = recipient.role ?? 'writer';
      if (!email || !isShareRole(role)) {
        failures.push({ email_address: email ?? null, error: 'Invalid recipient data' });
        continue;
      }
      try {
        const response = await session.drive.permissions.create({
          fileId: args.spreadsheet_id,
          requestBody: { type: 'user', role, emailAddress: email },
          sendNotificationEmail: args.send_notification,
          fields: 'id',
          supportsAllDrives: true,
        });
        successes.push({ email_address: email, role, permissionId: response.data.id ?? null });
      } catch (error) {
        failures.push({ email_address: email, error: `Failed to share: ${describeError(error)}` });
      }
    }

    return { successes, failures };
  },
});

export const DRIVE_TOOLS: readonly RegisteredTool[] = [listSpreadsheets, shareSpreadsheet];
