import { AccountApi } from '../clients/account-service.client';
import { CatalogApi } from '../clients/catalog-service.client';
import { ErrorCode, isOperationalError, toErrorFrame } from '../errors';
import { ErrorFrame, Session, UserType } from '../protocol/types';
import { SessionValidator } from '../session/session-validator';
import { Logger } from '../utils/logger';

export interface GatewayDependencies {
  catalog: CatalogApi;
  accounts: AccountApi;
  sessions: SessionValidator;
  logger: Logger;
}

/**
 * Common ground for the role-facing gateways. Subclasses validate the
 * session for their own role and never let an error escape a request.
 */
export abstract class GatewayService {
  protected readonly catalog: CatalogApi;
  protected readonly accounts: AccountApi;
  protected readonly logger: Logger;
  private readonly sessions: SessionValidator;

  protected abstract readonly role: UserType;

  constructor(deps: GatewayDependencies) {
    this.catalog = deps.catalog;
    this.accounts = deps.accounts;
    this.sessions = deps.sessions;
    this.logger = deps.logger;
  }

  protected authenticate(sessionId: string): Promise<Session> {
    return this.sessions.validate(sessionId, this.role);
  }

  protected fail(operation: string, error: unknown, fallback: string): ErrorFrame {
    const frame = toErrorFrame(error, fallback);
    if (!isOperationalError(error) || error.code === ErrorCode.SERVICE_UNAVAILABLE) {
      this.logger.warn({ operation, err: error }, `${operation} failed: ${frame.message}`);
    } else {
      this.logger.debug({ operation, code: error.code }, `${operation} rejected: ${frame.message}`);
    }
    return frame;
  }
}
