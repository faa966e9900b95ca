/**
 * OAuth2 for the Gmail, Drive and Sheets clients.
 *
 * Client id and secret come from the downloaded OAuth client file
 * (credentials.json). Tokens come from GOOGLE_TOKEN_JSON or the token file;
 * refreshed tokens are written back to the token file. When no token exists
 * the consent flow is run once on a loopback redirect.
 */

import fs from 'node:fs';
import { createServer } from 'node:http';
import { google, type Auth } from 'googleapis';
import type { Logger } from '../logger.js';

export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/spreadsheets'
];

const REDIRECT_PORT = 3333;
const REDIRECT_PATH = '/oauth2callback';

export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

export interface AuthOptions {
  credentialsPath: string;
  tokenPath: string;
  tokenJson?: string;
  logger: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

/**
 * Accepts both "installed" (desktop) and "web" client files.
 */
export function parseClientSecrets(text: string): ClientSecrets {
  const data: unknown = JSON.parse(text);
  const section = isRecord(data) ? (data.installed ?? data.web) : undefined;
  if (!isRecord(section)) {
    throw new AuthenticationError('OAuth client file has neither an "installed" nor a "web" section');
  }
  const clientId = optionalString(section.client_id);
  const clientSecret = optionalString(section.client_secret);
  if (!clientId || !clientSecret) {
    throw new AuthenticationError('OAuth client file is missing client_id or client_secret');
  }
  return { clientId, clientSecret };
}

export function parseTokens(text: string): Auth.Credentials {
  const data: unknown = JSON.parse(text);
  if (!isRecord(data)) {
    throw new AuthenticationError('Stored token is not a JSON object');
  }
  const tokens: Auth.Credentials = {
    access_token: optionalString(data.access_token),
    refresh_token: optionalString(data.refresh_token),
    scope: optionalString(data.scope),
    token_type: optionalString(data.token_type),
    expiry_date: typeof data.expiry_date === 'number' ? data.expiry_date : undefined
  };
  if (!tokens.refresh_token && !tokens.access_token) {
    throw new AuthenticationError('Stored token has neither a refresh token nor an access token');
  }
  return tokens;
}

function readStoredTokens(options: AuthOptions): Auth.Credentials | null {
  if (options.tokenJson && options.tokenJson.trim()) {
    return parseTokens(options.tokenJson);
  }
  if (fs.existsSync(options.tokenPath)) {
    return parseTokens(fs.readFileSync(options.tokenPath, 'utf8'));
  }
  return null;
}

function saveTokens(tokenPath: string, tokens: Auth.Credentials): void {
  fs.writeFileSync(tokenPath, JSON.stringify(tokens, null, 2), { encoding: 'utf8', mode: 0o600 });
}

/**
 * One-time consent flow: print the consent URL and wait for the redirect.
 */
function runConsentFlow(client: Auth.OAuth2Client, logger: Logger): Promise<Auth.Credentials> {
  return new Promise((resolve, reject) => {
    const authUrl = client.generateAuthUrl({ access_type: 'offline', scope: SCOPES, prompt: 'consent' });

    const server = createServer((req, res) => {
      const url = req.url ? new URL(req.url, `http://localhost:${REDIRECT_PORT}`) : null;
      if (!url || url.pathname !== REDIRECT_PATH) {
        res.writeHead(404);
        res.end('Not found');
        return;
      }

      const error = url.searchParams.get('error');
      const code = url.searchParams.get('code');
      if (error || !code) {
        res.writeHead(400);
        res.end('Authorization failed');
        server.close();
        reject(new AuthenticationError(`Consent was not granted: ${error ?? 'no code received'}`));
        return;
      }

      client.getToken(code).then(
        ({ tokens }) => {
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end('Authorization complete. You can close this window.');
          server.close();
          resolve(tokens);
        },
        (err: unknown) => {
          res.writeHead(500);
          res.end('Token exchange failed');
          server.close();
          reject(new AuthenticationError(`Token exchange failed: ${err instanceof Error ? err.message : String(err)}`));
        }
      );
    });

    server.on('error', err => reject(new AuthenticationError(`Could not start consent listener: ${err.message}`)));
    server.listen(REDIRECT_PORT, () => {
      logger.info(`Open this URL to authorize access:\n${authUrl}`);
    });
  });
}

/**
 * Build an authorized OAuth2 client, or throw AuthenticationError.
 */
export async function authorize(
  options: AuthOptions,
  { interactive = false }: { interactive?: boolean } = {}
): Promise<Auth.OAuth2Client> {
  const { logger } = options;

  let secrets: ClientSecrets;
  try {
    secrets = parseClientSecrets(fs.readFileSync(options.credentialsPath, 'utf8'));
  } catch (err) {
    if (err instanceof AuthenticationError) throw err;
    throw new AuthenticationError(
      `Could not read OAuth client file ${options.credentialsPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const client = new google.auth.OAuth2(
    secrets.clientId,
    secrets.clientSecret,
    `http://localhost:${REDIRECT_PORT}${REDIRECT_PATH}`
  );

  let tokens = readStoredTokens(options);
  if (!tokens) {
    if (!interactive) {
      throw new AuthenticationError(`No stored token at ${options.tokenPath}; run "npm run authorize" once`);
    }
    tokens = await runConsentFlow(client, logger);
    saveTokens(options.tokenPath, tokens);
    logger.info(`Token saved to ${options.tokenPath}`);
  }
  client.setCredentials(tokens);

  // Refreshed tokens replace the stored ones; the refresh token is only sent once
  const usingTokenFile = !(options.tokenJson && options.tokenJson.trim());
  client.on('tokens', refreshed => {
    if (!usingTokenFile) return;
    try {
      saveTokens(options.tokenPath, { ...client.credentials, ...refreshed });
    } catch (err) {
      logger.warn(`Could not save refreshed token: ${err instanceof Error ? err.message : String(err)}`);
    }
  });

  try {
    await client.getAccessToken();
  } catch (err) {
    throw new AuthenticationError(`Token refresh failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  logger.info('Authentication successful');
  return client;
}
