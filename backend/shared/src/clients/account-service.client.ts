/**
 * Account Service Client
 *
 * Client for the external account/session store.
 */

import { BaseServiceClient } from './base-service-client';
import { AccountRequest, AccountResponse, accountResponseSchema } from '../protocol/account.protocol';
import { Buyer, Seller, Session, UserType } from '../protocol/types';
import { ServiceAddress } from '../config/address';
import { Logger } from '../utils/logger';

export interface CreatedSession {
  sessionId: string;
  expiration: number;
}

export interface AccountApi {
  createBuyer(buyerName: string, password: string): Promise<string>;
  createSeller(sellerName: string, password: string): Promise<string>;
  getBuyerByName(buyerName: string): Promise<Buyer | null>;
  getSellerByName(sellerName: string): Promise<Seller | null>;
  getSeller(sellerId: string): Promise<Seller | null>;
  createSession(userId: string, userType: UserType): Promise<CreatedSession>;
  getSession(sessionId: string): Promise<Session | null>;
  deleteSession(sessionId: string): Promise<void>;
}

export class AccountServiceClient
  extends BaseServiceClient<AccountRequest, AccountResponse>
  implements AccountApi {
  constructor(address: ServiceAddress, logger: Logger) {
    super({
      address,
      serviceName: 'account-service',
      responseSchema: accountResponseSchema,
      logger,
    });
  }

  async createBuyer(buyerName: string, password: string): Promise<string> {
    const response = await this.call({ type: 'CreateBuyer', buyerName, password }, 'BuyerCreated');
    return response.buyerId;
  }

  async createSeller(sellerName: string, password: string): Promise<string> {
    const response = await this.call({ type: 'CreateSeller', sellerName, password }, 'SellerCreated');
    return response.sellerId;
  }

  async getBuyerByName(buyerName: string): Promise<Buyer | null> {
    const response = await this.call({ type: 'GetBuyerByName', buyerName }, 'Buyer');
    return response.buyer;
  }

  async getSellerByName(sellerName: string): Promise<Seller | null> {
    const response = await this.call({ type: 'GetSellerByName', sellerName }, 'Seller');
    return response.seller;
  }

  async getSeller(sellerId: string): Promise<Seller | null> {
    const response = await this.call({ type: 'GetSeller', sellerId }, 'Seller');
    return response.seller;
  }

  async createSession(userId: string, userType: UserType): Promise<CreatedSession> {
    const { sessionId, expiration } = await this.call({ type: 'CreateSession', userId, userType }, 'SessionCreated');
    return { sessionId, expiration };
  }

  async getSession(sessionId: string): Promise<Session | null> {
    const response = await this.call({ type: 'GetSession', sessionId }, 'Session');
    return response.session;
  }

  /**
   * Idempotent on the store side
   */
  async deleteSession(sessionId: string): Promise<void> {
    await this.call({ type: 'DeleteSession', sessionId }, 'SessionDeleted');
  }
}
