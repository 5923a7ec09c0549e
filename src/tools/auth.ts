import { describeScopes } from '../auth/scopes.js';
import { adaptTool } from './registry.js';
import type { RegisteredTool } from './registry.js';
import { GetAuthStatusSchema } from './schemas.js';

export const getAuthStatus = adaptTool({
  name: 'get_auth_status',
  description: 'Show how the server authenticated: the method used, principal type, granted scopes and refresh capability. Useful when drive tools fail because of narrowed scopes.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  argsSchema: GetAuthStatusSchema,
  returns: 'mapping',
  async handler(_args, { session }) {
    const { auth } = session;
    return {
      method: auth.method,
      principal: auth.principal,
      scopes: [...auth.scopes],
      scopeDescriptions: describeScopes(auth.scopes),
      initialTokenExpiry: auth.expiry ? auth.expiry.toISOString() : null,
      hasRefreshToken: auth.refreshable,
      folderId: session.folderId,
    };
  },
});

export const AUTH_TOOLS: readonly RegisteredTool[] = [getAuthStatus];
