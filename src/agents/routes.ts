/**
 * Agent Routes
 *
 * The surface Workspace agents call to obtain credentials for the current
 * session:
 * - GET /agents                 List registered agents and their scopes
 * - GET /agents/:agent/token    Hand out an access token covering the agent's scopes
 * - GET /agents/:agent/status   Report whether the session is authorized for the agent
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { CredentialCore, ResolvedCredential } from '../auth';
import { agentLogger } from '../utils/logger';
import { requireSessionId } from '../oauth/session';
import { safeReturnTarget } from '../oauth/routes';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireCredential */
      credential?: ResolvedCredential;
    }
  }
}

/**
 * Resolve credentials for the agent named by `:agent`. Answers the request
 * itself when the session must (re)authorize first.
 */
export function requireCredential(core: CredentialCore): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const sessionId = requireSessionId(req);
    const agent = req.params.agent ?? '';

    if (!core.registry.has(agent)) {
      res.status(404).json({ error: 'unknown_agent', agent });
      return;
    }

    try {
      const returnTarget = safeReturnTarget(typeof req.query.returnTo === 'string' ? req.query.returnTo : undefined);
      const result = await core.resolver.resolveForAgents(sessionId, [agent], {
        ...(returnTarget !== undefined && { returnTarget }),
      });

      if (result.status === 'needs_authorization') {
        agentLogger.info(`Agent "${agent}" needs authorization: ${result.reason}`);
        res.status(result.reason === 'provider_unavailable' ? 503 : 401).json({
          error: 'authorization_required',
          reason: result.reason,
          authorizeUrl: result.redirectUrl,
        });
        return;
      }

      req.credential = result.credential;
      next();
    } catch (error) {
      agentLogger.error(`Failed to resolve credentials for agent "${agent}"`, { error });
      res.status(500).json({ error: 'internal_error' });
    }
  };
}

function resolvedCredential(req: Request): ResolvedCredential {
  if (!req.credential) {
    throw new Error('requireCredential must run before this handler');
  }
  return req.credential;
}

export function createAgentRoutes(core: CredentialCore): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      agents: core.registry.agents().map((name) => ({
        name,
        scopes: core.registry.scopesFor(name),
      })),
    });
  });

  router.get('/:agent/token', requireCredential(core), (req: Request, res: Response) => {
    const credential = resolvedCredential(req);
    res.set('Cache-Control', 'no-store');
    res.json({
      accessToken: credential.accessToken,
      expiresAt: new Date(credential.expiresAt).toISOString(),
      scopes: credential.scopes,
    });
  });

  router.get('/:agent/status', requireCredential(core), (req: Request, res: Response) => {
    const credential = resolvedCredential(req);
    res.json({
      agent: req.params.agent,
      authorized: true,
      scopes: credential.scopes,
      expiresAt: new Date(credential.expiresAt).toISOString(),
    });
  });

  return router;
}
