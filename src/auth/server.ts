import express from 'express';
import http from 'http';
import { OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import open from 'open';
import { v4 as uuidv4 } from 'uuid';
import { describeError, log } from '../logging.js';
import type { ClientSecrets } from './client.js';
import { describeScopes } from './scopes.js';

const LOOPBACK_HOST = '127.0.0.1';

interface PendingAuthorization {
  resolve: (tokens: Credentials) => void;
  reject: (error: Error) => void;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function renderPage(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: sans-serif; display: flex; justify-content: center; align-items: center; min-height: 100vh; background-color: #f4f4f4; margin: 0; }
    .container { max-width: 600px; padding: 2em; background-color: #fff; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    code { background-color: #eee; padding: 0.2em 0.4em; border-radius: 4px; word-break: break-all; }
  </style>
</head>
<body><div class="container">${body}</div></body>
</html>`;
}

/**
 * Runs the installed-app consent flow: a loopback callback server on an
 * ephemeral port, the consent page opened in the user's browser, and the
 * authorization code exchanged for tokens.
 */
export class AuthServer {
  private app: express.Express;
  private server: http.Server | null = null;
  private flowOAuth2Client: OAuth2Client | null = null;
  private pending: PendingAuthorization | null = null;
  private readonly state = uuidv4();

  constructor(
    private readonly secrets: ClientSecrets,
    private readonly scopes: readonly string[]
  ) {
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/', (_req, res) => {
      if (!this.flowOAuth2Client) {
        res.status(503).send('Authentication flow not started.');
        return;
      }
      res.send(renderPage('Sheets MCP Authentication',
        `<h1>Sheets MCP Authentication</h1><a href="${escapeHtml(this.buildAuthUrl(this.flowOAuth2Client))}">Authenticate with Google</a>`));
    });

    this.app.get('/oauth2callback', async (req, res) => {
      const { code, state, error } = req.query;

      if (typeof error === 'string') {
        res.status(400).send(renderPage('Authentication Failed',
          `<h1>Authentication Failed</h1><p><code>${escapeHtml(error)}</code></p>`));
        this.settle(new Error(`Consent was not granted: ${error}`));
        return;
      }
      if (state !== this.state) {
        res.status(400).send('State parameter mismatch');
        return;
      }
      if (typeof code !== 'string' || code.length === 0) {
        res.status(400).send('Authorization code missing');
        return;
      }
      if (!this.flowOAuth2Client) {
        res.status(500).send('Authentication flow not properly initiated.');
        return;
      }

      try {
        const { tokens } = await this.flowOAuth2Client.getToken(code);
        const granted = tokens.scope ? tokens.scope.split(' ') : [...this.scopes];
        const scopeList = Object.entries(describeScopes(granted))
          .map(([scope, description]) => `<li><strong>${escapeHtml(scope.split('/').pop() ?? scope)}</strong> - ${escapeHtml(description)}</li>`)
          .join('');
        res.send(renderPage('Authentication Successful',
          `<h1>Authentication Successful!</h1><h2>Granted Permissions</h2><ul>${scopeList}</ul>` +
          '<p>You can now close this window and return to your MCP client.</p>'));
        this.settle(tokens);
      } catch (exchangeError: unknown) {
        const message = describeError(exchangeError);
        res.status(500).send(renderPage('Authentication Failed',
          `<h1>Authentication Failed</h1><p>An error occurred during authentication:</p><p><code>${escapeHtml(message)}</code></p>`));
        this.settle(new Error(`Token exchange failed: ${message}`));
      }
    });
  }

  private buildAuthUrl(client: OAuth2Client): string {
    return client.generateAuthUrl({
      access_type: 'offline',
      scope: [...this.scopes],
      prompt: 'consent',
      state: this.state,
    });
  }

  private settle(outcome: Credentials | Error): void {
    const pending = this.pending;
    this.pending = null;
    if (!pending) {
      return;
    }
    if (outcome instanceof Error) {
      pending.reject(outcome);
    } else {
      pending.resolve(outcome);
    }
  }

  /**
   * Resolves with the tokens granted by the user. The callback server is shut
   * down whether the flow succeeds or fails.
   */
  async authorize(openBrowser = true): Promise<Credentials> {
    const port = await this.listen();
    this.flowOAuth2Client = new OAuth2Client(
      this.secrets.client_id,
      this.secrets.client_secret || undefined,
      `http://${LOOPBACK_HOST}:${port}/oauth2callback`
    );

    const completion = new Promise<Credentials>((resolve, reject) => {
      this.pending = { resolve, reject };
    });

    const authorizeUrl = this.buildAuthUrl(this.flowOAuth2Client);
    console.error('\nAUTHENTICATION REQUIRED');
    console.error(`If the browser doesn't open, visit:\n${authorizeUrl}\n`);

    try {
      if (openBrowser) {
        try {
          await open(authorizeUrl);
        } catch (error) {
          log('Could not open browser', { error: describeError(error) });
        }
      }
      return await completion;
    } finally {
      await this.stop();
    }
  }

  private listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(0, LOOPBACK_HOST, () => {
        const address = server.address();
        if (typeof address === 'object' && address !== null) {
          this.server = server;
          log(`Authentication server listening on http://${LOOPBACK_HOST}:${address.port}`);
          resolve(address.port);
        } else {
          server.close();
          reject(new Error('Authentication server did not bind to a TCP port'));
        }
      });
      server.on('error', reject);
    });
  }

  getRunningPort(): number | null {
    if (this.server) {
      const address = this.server.address();
      if (typeof address === 'object' && address !== null) {
        return address.port;
      }
    }
    return null;
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.server) {
        this.server.close((err) => {
          if (err) {
            reject(err);
          } else {
            this.server = null;
            resolve();
          }
        });
      } else {
        resolve();
      }
    });
  }
}
