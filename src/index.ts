#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { resolveCredential } from './auth/resolver.js';
import { createDefaultDependencies, createDefaultStrategies, createInteractiveFlowStrategy } from './auth/strategies.js';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { describeError, log } from './logging.js';
import { createServer, packageJson, VERSION } from './server.js';
import { createSessionContext } from './session.js';

function showVersion(): void {
  console.log(`${packageJson.name} v${VERSION}`);
}

function showHelp(): void {
  console.log(`${packageJson.name} v${VERSION}

Usage:
  sheets-mcp-server [command]

Commands:
  start      Start the MCP server over stdio (default)
  auth       Run the interactive Google OAuth flow and cache the token
  version    Show version information
  help       Show this help message

Environment:
  CREDENTIALS_CONFIG     Base64-encoded service account key JSON
  SERVICE_ACCOUNT_PATH   Service account key file (default: service_account.json)
  TOKEN_PATH             Cached OAuth token file (default: token.json)
  CREDENTIALS_PATH       OAuth client secrets file (default: credentials.json)
  DRIVE_FOLDER_ID        Drive folder used by list_spreadsheets and create_spreadsheet
  GOOGLE_SCOPES          Comma separated OAuth scopes (default: spreadsheets, drive)

Authentication is tried in this order: CREDENTIALS_CONFIG, service account
file, Application Default Credentials, cached OAuth token, interactive OAuth.`);
}

async function runAuthCommand(): Promise<void> {
  const config = loadConfig();
  const strategy = createInteractiveFlowStrategy(config, createDefaultDependencies(config));
  const outcome = await strategy.attempt();
  if (outcome.status !== 'succeeded') {
    console.error(`Authentication failed: ${outcome.reason}`);
    process.exit(1);
  }
  console.error(`Authentication successful. Token saved to ${config.tokenPath}`);
}

async function startServer(): Promise<void> {
  console.error(`Starting Sheets MCP Server v${VERSION}...`);
  const config = loadConfig();
  const resolved = await resolveCredential(createDefaultStrategies(config));
  const session = createSessionContext(resolved, config);

  const server = createServer(session);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`Server v${VERSION} started successfully`, { auth: resolved.method, folderId: config.folderId });

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

// -----------------------------------------------------------------------------
// MAIN EXECUTION
// -----------------------------------------------------------------------------

function parseCliArgs(): { command: string | undefined } {
  const args = process.argv.slice(2);
  let command: string | undefined;

  for (const arg of args) {
    // Handle special version/help flags as commands
    if (arg === '--version' || arg === '-v' || arg === '--help' || arg === '-h') {
      command = arg;
      continue;
    }

    // Check for command (first non-option argument)
    if (!command && !arg.startsWith('--')) {
      command = arg;
    }
  }

  return { command };
}

async function main(): Promise<void> {
  const { command } = parseCliArgs();

  switch (command) {
    case 'auth':
      await runAuthCommand();
      break;
    case 'start':
    case undefined:
      try {
        await startServer();
      } catch (error) {
        if (error instanceof ConfigurationError) {
          console.error(error.message);
        } else {
          console.error('Failed to start server:', describeError(error));
        }
        process.exit(1);
      }
      break;
    case 'version':
    case '--version':
    case '-v':
      showVersion();
      break;
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', describeError(error));
  process.exit(1);
});
