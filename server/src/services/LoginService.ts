/**
 * LoginService.ts
 * Discord login handoff: builds the authorize URL and turns a callback code
 * into a bearer token for the recorder.
 */

import * as discordClient from '../discordClient';
import { AuthSessionService } from './AuthSessionService';
import { StructuredLogger } from '../types/Logger';

export interface DiscordLoginConfig {
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
  homeGuildId: string;
  applicationCallback: string;
}

export class NotGuildMemberError extends Error {
  constructor() {
    super('You must be a member of the Discord server');
    this.name = 'NotGuildMemberError';
  }
}

export interface CompletedLogin {
  driverId: string;
  driverName: string;
  token: string;
  redirectUrl: string;
}

export class LoginService {
  constructor(
    private authSessionService: AuthSessionService,
    private getConfig: () => DiscordLoginConfig,
    private logger: StructuredLogger = new StructuredLogger('Login')
  ) {}

  /**
   * Discord authorize URL carrying the recorder's state value
   */
  buildAuthorizeUrl(state: string): string {
    const { clientId, callbackUrl } = this.getConfig();
    return (
      `${discordClient.DISCORD_AUTHORIZE_URL}?` +
      new URLSearchParams({
        client_id: clientId,
        response_type: 'code',
        redirect_uri: callbackUrl,
        scope: 'identify guilds',
        state
      })
    );
  }

  /**
   * Exchange the code, check home guild membership and issue a token.
   * The redirect URL hands the token and username back to the recorder.
   *
   * @throws {NotGuildMemberError} If the user is not in the home guild
   */
  async completeLogin(code: string, state: string): Promise<CompletedLogin> {
    const discordConfig = this.getConfig();
    const accessToken = await discordClient.exchangeCode(code, discordConfig);
    const user = await discordClient.fetchUser(accessToken);
    const guildIds = await discordClient.fetchGuildIds(accessToken);

    if (!guildIds.includes(discordConfig.homeGuildId)) {
      this.logger.warn('Login refused, not a member of the home guild', user.username);
      throw new NotGuildMemberError();
    }

    const token = this.authSessionService.createSession(user.id, user.username);
    const redirectUrl =
      `${discordConfig.applicationCallback}?` +
      new URLSearchParams({ state, code: token, name: user.username });

    return { driverId: user.id, driverName: user.username, token, redirectUrl };
  }
}
