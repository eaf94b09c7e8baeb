/**
 * OAuth Routes
 *
 * Express routes for the browser side of the authorization flow:
 * - GET  /auth/login:    Start a flow for one or more agents, redirect to Google
 * - GET  /auth/callback: Handle Google's redirect, store the credential
 * - POST /auth/logout:   Forget and revoke the session's credential
 * - GET  /auth/status:   Report what the session is authorized for
 */

import { Router, type Request, type Response } from 'express';
import type { CredentialCore } from '../auth';
import { ExchangeFailedError, InvalidStateError, UnknownAgentError } from '../auth/errors';
import { isSubset } from '../auth/scopes';
import { authLogger } from '../utils/logger';
import { escapeHtml, renderPage, signInAgainPage } from './pages';
import { requireSessionId } from './session';

/**
 * Read a single-valued query parameter
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Accept only same-origin paths as post-login destinations
 */
export function safeReturnTarget(value: string | undefined): string | undefined {
  if (!value || !value.startsWith('/') || value.startsWith('//') || value.includes('\\')) {
    return undefined;
  }
  return value;
}

export function createAuthRoutes(core: CredentialCore): Router {
  const router = Router();

  /**
   * GET /auth/login?agents=sheets,docs&returnTo=/path
   *
   * Without `agents`, consent is requested for every registered agent.
   */
  router.get('/login', async (req: Request, res: Response): Promise<void> => {
    const sessionId = requireSessionId(req);
    const agentsParam = queryString(req, 'agents');
    const agents = agentsParam
      ? agentsParam.split(',').map((name) => name.trim()).filter(Boolean)
      : core.registry.agents();

    if (agents.length === 0) {
      res.status(400).send(
        renderPage('No Agents Selected', '<p>Name at least one agent in <code>agents</code> to sign in for.</p>')
      );
      return;
    }

    try {
      const scopes = core.registry.mergedScopes(...agents);
      const returnTarget = safeReturnTarget(queryString(req, 'returnTo'));
      const url = await core.flow.beginAuthorization(sessionId, scopes, returnTarget);
      res.redirect(url);
    } catch (error) {
      if (error instanceof UnknownAgentError) {
        res.status(400).send(
          renderPage(
            'Unknown Agent',
            `<p>No agent named <code>${escapeHtml(error.agentName)}</code> is registered.</p>`
          )
        );
        return;
      }

      authLogger.error('Error starting authorization', { error });
      res.status(500).send(
        renderPage('Error', '<p>Failed to start sign-in. Please check server logs.</p>')
      );
    }
  });

  /**
   * GET /auth/callback?state=...&code=...
   */
  router.get('/callback', async (req: Request, res: Response): Promise<void> => {
    const sessionId = requireSessionId(req);
    const state = queryString(req, 'state');
    const code = queryString(req, 'code');
    const providerError = queryString(req, 'error');

    // User cancelled on the consent screen, or Google refused
    if (providerError) {
      if (state) {
        await core.flow.abandonAuthorization(state, providerError).catch((error: unknown) => {
          authLogger.error('Error abandoning authorization', { error });
        });
      }
      res.status(400).send(
        renderPage(
          'Authorization Cancelled',
          `<p>You cancelled the authorization or an error occurred.</p>
          <p>Error: <code>${escapeHtml(providerError)}</code></p>
          <a href="/auth/login" class="btn">Try again</a>`
        )
      );
      return;
    }

    if (!state || !code) {
      authLogger.warn('Callback without state or code');
      res.status(400).send(
        renderPage('Error', '<p>No authorization code received from Google.</p>')
      );
      return;
    }

    try {
      const result = await core.flow.completeAuthorization(state, code, { sessionId });

      if (result.missingScopes.length > 0) {
        const items = result.missingScopes.map((scope) => `<li><code>${escapeHtml(scope)}</code></li>`).join('');
        res.status(400).send(
          renderPage(
            'Missing Permission',
            `<div class="box"><strong>Some permissions were not granted:</strong><ul>${items}</ul>
            <p>Agents that need them will ask you to sign in again.</p></div>
            <a href="${escapeHtml(result.returnTarget ?? '/')}" class="btn">Continue</a>`
          )
        );
        return;
      }

      res.redirect(result.returnTarget ?? '/');
    } catch (error) {
      if (error instanceof InvalidStateError || error instanceof ExchangeFailedError) {
        const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
        authLogger.warn(`Callback failed (${error.code})${cause}`);
        res.status(400).send(signInAgainPage());
        return;
      }

      authLogger.error('Unexpected callback error', { error });
      res.status(500).send(signInAgainPage());
    }
  });

  /**
   * POST /auth/logout
   */
  router.post('/logout', async (req: Request, res: Response): Promise<void> => {
    const sessionId = requireSessionId(req);
    try {
      await core.flow.signOut(sessionId);
      res.status(204).end();
    } catch (error) {
      authLogger.error('Error signing out', { error });
      res.status(500).json({ error: 'logout_failed' });
    }
  });

  /**
   * GET /auth/status
   *
   * Never includes token material.
   */
  router.get('/status', async (req: Request, res: Response): Promise<void> => {
    const sessionId = requireSessionId(req);
    try {
      const record = await core.store.get(sessionId);

      if (!record) {
        res.json({ authenticated: false });
        return;
      }

      res.json({
        authenticated: true,
        scopes: record.scopes,
        expiresAt: new Date(record.expiresAt).toISOString(),
        agents: core.registry
          .agents()
          .filter((agent) => isSubset(core.registry.scopesFor(agent), record.scopes)),
      });
    } catch (error) {
      authLogger.error('Error reading credential status', { error });
      res.status(500).json({ error: 'status_unavailable' });
    }
  });

  return router;
}
