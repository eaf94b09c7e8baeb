/**
 * HTTP Server
 *
 * Express application exposing the browser sign-in flow under /auth and the
 * credential hand-off for agents under /agents.
 */

import cookieParser from 'cookie-parser';
import express, { type Express } from 'express';
import type { Server } from 'http';
import type { CredentialCore } from '../auth';
import { createAgentRoutes } from '../agents/routes';
import { GOOGLE_PERMISSIONS_URL } from '../constants/google-api';
import { serverLogger } from '../utils/logger';
import { escapeHtml, renderPage } from './pages';
import { createAuthRoutes } from './routes';
import { sessionMiddleware } from './session';

export const SERVICE_NAME = 'workspace-agent-gateway';

export interface HttpServerOptions {
  core: CredentialCore;
  sessionSecret: string;
  cookieSecure: boolean;
}

export function createHttpServer(options: HttpServerOptions): Express {
  const { core } = options;
  const app = express();

  app.use(cookieParser(options.sessionSecret));
  app.use(sessionMiddleware({ secure: options.cookieSecure }));
  app.use(express.json());

  app.use('/auth', createAuthRoutes(core));
  app.use('/agents', createAgentRoutes(core));

  // Home page with the agent list
  app.get('/', (_req, res) => {
    const agents = core.registry
      .agents()
      .map((name) => `<li><code>${escapeHtml(name)}</code></li>`)
      .join('');

    res.send(
      renderPage(
        'Workspace Agent Gateway',
        `<p>Sign in once with Google to let the Workspace agents act on your behalf.</p>
        <div class="box"><strong>Registered agents:</strong><ul>${agents}</ul></div>
        <a href="/auth/login" class="btn">Sign in with Google</a>
        <p>Signing out revokes the gateway's access. You can also remove it from your
        <a href="${GOOGLE_PERMISSIONS_URL}">Google account permissions</a>.</p>`
      )
    );
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startHttpServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      serverLogger.info(`HTTP server listening on http://localhost:${port}`);
      serverLogger.info(`Sign in at: http://localhost:${port}/auth/login`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
