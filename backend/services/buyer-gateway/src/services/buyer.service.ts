import {
  AuthenticationError,
  BuyerRequest,
  BuyerResponse,
  GatewayService,
  NotFoundError,
  UserType,
  withFallback,
} from '@marketline/shared';

export type BuyerRequestOf<K extends BuyerRequest['type']> = Extract<BuyerRequest, { type: K }>;

/**
 * Buyer-facing operations. Each one validates the session (except the
 * account operations), issues its downstream calls in order and maps the
 * outcome onto exactly one response frame.
 */
export class BuyerService extends GatewayService {
  protected readonly role: UserType = 'Buyer';

  async createAccount({ buyerName, password }: BuyerRequestOf<'CreateAccount'>): Promise<BuyerResponse> {
    try {
      const buyerId = await this.accounts.createBuyer(buyerName, password);
      return { type: 'CreateAccount', buyerId };
    } catch (error) {
      return this.fail('CreateAccount', error, 'Failed to create buyer account');
    }
  }

  /**
   * Plaintext comparison against the stored password
   */
  async login({ buyerName, password }: BuyerRequestOf<'Login'>): Promise<BuyerResponse> {
    try {
      const buyer = await withFallback(this.accounts.getBuyerByName(buyerName), 'Login failed');
      if (!buyer) {
        throw new NotFoundError('Buyer', { buyerName });
      }
      if (buyer.password !== password) {
        throw AuthenticationError.invalidPassword();
      }

      const { sessionId } = await withFallback(
        this.accounts.createSession(buyer.buyerId, 'Buyer'),
        'Failed to create session'
      );
      return { type: 'Login', sessionId };
    } catch (error) {
      return this.fail('Login', error, 'Login failed');
    }
  }

  async logout({ sessionId }: BuyerRequestOf<'Logout'>): Promise<BuyerResponse> {
    try {
      await this.accounts.deleteSession(sessionId);
      return { type: 'Logout' };
    } catch (error) {
      return this.fail('Logout', error, 'Logout failed');
    }
  }

  async searchItemsForSale({ sessionId, category, keywords }: BuyerRequestOf<'SearchItemsForSale'>): Promise<BuyerResponse> {
    try {
      await this.authenticate(sessionId);
      const items = await this.catalog.searchItems(category, keywords);
      return { type: 'SearchItemsForSale', items };
    } catch (error) {
      return this.fail('SearchItemsForSale', error, 'Search failed');
    }
  }

  async getItem({ sessionId, itemId }: BuyerRequestOf<'GetItem'>): Promise<BuyerResponse> {
    try {
      await this.authenticate(sessionId);
      const item = await this.catalog.getItem(itemId);
      return { type: 'GetItem', item };
    } catch (error) {
      return this.fail('GetItem', error, 'Failed to get item');
    }
  }

  async addItemToCart({ sessionId, itemId, quantity }: BuyerRequestOf<'AddItemToCart'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      await this.catalog.addToCart(session.userId, itemId, quantity);
      return { type: 'AddItemToCart' };
    } catch (error) {
      return this.fail('AddItemToCart', error, 'Failed to add to cart');
    }
  }

  async removeItemFromCart({ sessionId, itemId, quantity }: BuyerRequestOf<'RemoveItemFromCart'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      await this.catalog.removeFromCart(session.userId, itemId, quantity);
      return { type: 'RemoveItemFromCart' };
    } catch (error) {
      return this.fail('RemoveItemFromCart', error, 'Failed to remove from cart');
    }
  }

  /**
   * Reads the cart and writes it back unchanged. The two calls are not
   * atomic; a concurrent cart change between them is overwritten.
   */
  async saveCart({ sessionId }: BuyerRequestOf<'SaveCart'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const cart = await withFallback(this.catalog.getCart(session.userId), 'Failed to get cart');
      await withFallback(this.catalog.saveCart(session.userId, cart), 'Failed to save cart');
      return { type: 'SaveCart' };
    } catch (error) {
      return this.fail('SaveCart', error, 'Failed to save cart');
    }
  }

  async clearCart({ sessionId }: BuyerRequestOf<'ClearCart'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      await this.catalog.clearCart(session.userId);
      return { type: 'ClearCart' };
    } catch (error) {
      return this.fail('ClearCart', error, 'Failed to clear cart');
    }
  }

  async displayCart({ sessionId }: BuyerRequestOf<'DisplayCart'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const cart = await this.catalog.getCart(session.userId);
      return { type: 'DisplayCart', cart };
    } catch (error) {
      return this.fail('DisplayCart', error, 'Failed to get cart');
    }
  }

  /**
   * Read, increment, write back. Concurrent feedback on one item can lose
   * an increment: the last write replaces the whole record.
   */
  async provideFeedback({ sessionId, itemId, thumbsUp }: BuyerRequestOf<'ProvideFeedback'>): Promise<BuyerResponse> {
    try {
      await this.authenticate(sessionId);
      const item = await withFallback(this.catalog.getItem(itemId), 'Failed to get item');
      if (!item) {
        throw new NotFoundError('Item', { itemId });
      }

      const feedback = thumbsUp
        ? { ...item.feedback, thumbsUp: item.feedback.thumbsUp + 1 }
        : { ...item.feedback, thumbsDown: item.feedback.thumbsDown + 1 };

      await withFallback(this.catalog.updateItem({ ...item, feedback }), 'Failed to update feedback');
      return { type: 'ProvideFeedback' };
    } catch (error) {
      return this.fail('ProvideFeedback', error, 'Failed to update feedback');
    }
  }

  async getSellerRating({ sessionId, sellerId }: BuyerRequestOf<'GetSellerRating'>): Promise<BuyerResponse> {
    try {
      await this.authenticate(sessionId);
      const seller = await withFallback(this.accounts.getSeller(sellerId), 'Failed to get seller rating');
      if (!seller) {
        throw new NotFoundError('Seller', { sellerId });
      }
      return { type: 'GetSellerRating', feedback: seller.feedback };
    } catch (error) {
      return this.fail('GetSellerRating', error, 'Failed to get seller rating');
    }
  }

  /**
   * Always empty today: no buyer operation records purchases.
   */
  async getBuyerPurchases({ sessionId }: BuyerRequestOf<'GetBuyerPurchases'>): Promise<BuyerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const itemIds = await this.catalog.getPurchaseHistory(session.userId);
      return { type: 'GetBuyerPurchases', itemIds };
    } catch (error) {
      return this.fail('GetBuyerPurchases', error, 'Failed to get purchase history');
    }
  }
}
