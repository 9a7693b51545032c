/**
 * routes/discord.ts
 *
 * Discord OAuth handoff for the recorder
 * - Build the authorize URL carrying the recorder's state
 * - Handle the callback: verify guild membership, issue a token and
 *   redirect back to the recorder's local callback server
 */

import { Router, Request, Response } from 'express';
import { LoginService, NotGuildMemberError } from '../services/LoginService';

interface DiscordServices {
  loginService: LoginService;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export default (services: DiscordServices): Router => {
  const { loginService } = services;
  const router = Router();

  /**
   * GET /discord?state=...
   */
  router.get('/', (req: Request, res: Response): void => {
    const state = queryString(req.query.state) ?? 'default';
    try {
      res.json({ url: loginService.buildAuthorizeUrl(state) });
    } catch (error) {
      console.error('[DISCORD] Error building authorize URL:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * GET /discord/callback?code=...&state=...
   */
  router.get('/callback', async (req: Request, res: Response): Promise<void> => {
    const code = queryString(req.query.code);
    const state = queryString(req.query.state) ?? 'default';

    if (!code) {
      res.status(400).json({ error: 'Missing code parameter' });
      return;
    }

    try {
      const login = await loginService.completeLogin(code, state);
      console.log(`[DISCORD] '${login.driverName}' authenticated`);
      res.redirect(login.redirectUrl);
    } catch (error) {
      if (error instanceof NotGuildMemberError) {
        res.status(403).json({ error: error.message });
        return;
      }
      console.error('[DISCORD] OAuth callback error:', error);
      res.status(400).json({ error: 'Token exchange failed' });
    }
  });

  return router;
};
