import { AccountApi } from '../clients/account-service.client';
import { AuthenticationError, withFallback } from '../errors';
import { Session, UserType } from '../protocol/types';
import { Logger } from '../utils/logger';

export type Clock = () => number;

/** Current Unix time in seconds */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Checks a session against the account store on every call; nothing is cached.
 *
 * Precedence is existence, then expiry, then role. An expired session is
 * deleted best-effort before the failure is reported.
 */
export class SessionValidator {
  constructor(
    private readonly accounts: AccountApi,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  async validate(sessionId: string, expectedType: UserType): Promise<Session> {
    const session = await withFallback(this.accounts.getSession(sessionId), 'Failed to validate session');

    if (!session) {
      throw AuthenticationError.sessionNotFound();
    }

    if (session.expiration < this.clock()) {
      await this.accounts.deleteSession(sessionId).catch((error: unknown) => {
        this.logger.debug({ err: error, sessionId }, 'Expired session cleanup failed');
      });
      throw AuthenticationError.sessionExpired();
    }

    if (session.userType !== expectedType) {
      throw AuthenticationError.invalidSessionType();
    }

    return session;
  }
}
