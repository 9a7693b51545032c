/**
 * callbackServer.ts
 *
 * Local HTTP endpoint the backend redirects the browser to after Discord
 * login. It accepts one callback whose state matches, then shuts down.
 */

import http from 'http';
import { randomBytes } from 'crypto';
import type { Logger } from '../logger';

export interface LoginResult {
  token: string;
  name: string;
}

/** Random, URL-safe value tying a callback to the login that started it */
export function createLoginState(): string {
  return randomBytes(24).toString('base64url');
}

export class CallbackServer {
  private server: http.Server | null = null;

  constructor(
    private port: number,
    private expectedState: string,
    private logger: Logger
  ) {}

  /**
   * Start listening. The returned promise resolves with the first valid
   * callback's token and name.
   */
  async start(): Promise<{ port: number; result: Promise<LoginResult> }> {
    let onLogin: (result: LoginResult) => void = () => undefined;
    const result = new Promise<LoginResult>((resolve) => {
      onLogin = resolve;
    });

    const server = http.createServer((req, res) => {
      const url = new URL(req.url || '/', 'http://127.0.0.1');
      if (req.method !== 'GET' || url.pathname !== '/callback') {
        res.writeHead(404);
        res.end();
        return;
      }

      const code = url.searchParams.get('code');
      const name = url.searchParams.get('name') ?? '';
      const state = url.searchParams.get('state');

      if (!code || state !== this.expectedState) {
        this.logger.warn('Rejected login callback');
        res.writeHead(400, { 'Content-Type': 'text/plain' });
        res.end('Invalid request. You can close this tab.');
        return;
      }

      this.logger.info(`Login succeeded for ${name}`);
      res.writeHead(200, { 'Content-Type': 'text/html' });
      res.end('<h2>Login complete.</h2>You can close this tab.');
      res.once('finish', () => this.stop());
      onLogin({ token: code, name });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, '127.0.0.1', () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    const port = address !== null && typeof address !== 'string' ? address.port : this.port;
    this.logger.info(`Login callback server listening on port ${port}`);
    return { port, result };
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server.closeAllConnections();
      this.server = null;
    }
  }
}
