import { NIL as PLACEHOLDER_ITEM_ID } from 'uuid';
import {
  AuthenticationError,
  ForbiddenError,
  GatewayService,
  Item,
  NotFoundError,
  SellerRequest,
  SellerResponse,
  Session,
  UserType,
  withFallback,
} from '@marketline/shared';

export type SellerRequestOf<K extends SellerRequest['type']> = Extract<SellerRequest, { type: K }>;

export class SellerService extends GatewayService {
  protected readonly role: UserType = 'Seller';

  async createAccount({ sellerName, password }: SellerRequestOf<'CreateAccount'>): Promise<SellerResponse> {
    try {
      const sellerId = await this.accounts.createSeller(sellerName, password);
      return { type: 'CreateAccount', sellerId };
    } catch (error) {
      return this.fail('CreateAccount', error, 'Failed to create seller account');
    }
  }

  async login({ sellerName, password }: SellerRequestOf<'Login'>): Promise<SellerResponse> {
    try {
      const seller = await withFallback(this.accounts.getSellerByName(sellerName), 'Login failed');
      if (!seller) {
        throw new NotFoundError('Seller', { sellerName });
      }
      if (seller.password !== password) {
        throw AuthenticationError.invalidPassword();
      }

      const { sessionId } = await withFallback(
        this.accounts.createSession(seller.sellerId, 'Seller'),
        'Failed to create session'
      );
      return { type: 'Login', sessionId };
    } catch (error) {
      return this.fail('Login', error, 'Login failed');
    }
  }

  async logout({ sessionId }: SellerRequestOf<'Logout'>): Promise<SellerResponse> {
    try {
      await this.accounts.deleteSession(sessionId);
      return { type: 'Logout' };
    } catch (error) {
      return this.fail('Logout', error, 'Logout failed');
    }
  }

  async getSellerRating({ sessionId }: SellerRequestOf<'GetSellerRating'>): Promise<SellerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const seller = await withFallback(this.accounts.getSeller(session.userId), 'Failed to get seller rating');
      if (!seller) {
        throw new NotFoundError('Seller', { sellerId: session.userId });
      }
      return { type: 'GetSellerRating', feedback: seller.feedback };
    } catch (error) {
      return this.fail('GetSellerRating', error, 'Failed to get seller rating');
    }
  }

  /**
   * The catalog assigns the item identity; the placeholder sent here is
   * discarded on create.
   */
  async registerItemForSale(request: SellerRequestOf<'RegisterItemForSale'>): Promise<SellerResponse> {
    try {
      const session = await this.authenticate(request.sessionId);
      const item: Item = {
        itemId: PLACEHOLDER_ITEM_ID,
        sellerId: session.userId,
        itemName: request.itemName,
        itemCategory: request.itemCategory,
        keywords: request.keywords,
        condition: request.condition,
        salePrice: request.salePrice,
        quantity: request.quantity,
        feedback: { thumbsUp: 0, thumbsDown: 0 },
      };

      const itemId = await this.catalog.createItem(item);
      return { type: 'RegisterItemForSale', itemId };
    } catch (error) {
      return this.fail('RegisterItemForSale', error, 'Failed to register item');
    }
  }

  async changeItemPrice({ sessionId, itemId, newPrice }: SellerRequestOf<'ChangeItemPrice'>): Promise<SellerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const item = await this.findOwnedItem(session, itemId);
      await withFallback(this.catalog.updateItem({ ...item, salePrice: newPrice }), 'Failed to update price');
      return { type: 'ChangeItemPrice' };
    } catch (error) {
      return this.fail('ChangeItemPrice', error, 'Failed to update price');
    }
  }

  async updateUnitsForSale({ sessionId, itemId, quantity }: SellerRequestOf<'UpdateUnitsForSale'>): Promise<SellerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const item = await this.findOwnedItem(session, itemId);
      await withFallback(this.catalog.updateItem({ ...item, quantity }), 'Failed to update quantity');
      return { type: 'UpdateUnitsForSale' };
    } catch (error) {
      return this.fail('UpdateUnitsForSale', error, 'Failed to update quantity');
    }
  }

  async displayItemsForSale({ sessionId }: SellerRequestOf<'DisplayItemsForSale'>): Promise<SellerResponse> {
    try {
      const session = await this.authenticate(sessionId);
      const items = await this.catalog.getItemsBySeller(session.userId);
      return { type: 'DisplayItemsForSale', items };
    } catch (error) {
      return this.fail('DisplayItemsForSale', error, 'Failed to get items');
    }
  }

  /**
   * Fetch for a read-modify-write. No lock is held between this read and
   * the caller's write.
   */
  private async findOwnedItem(session: Session, itemId: string): Promise<Item> {
    const item = await withFallback(this.catalog.getItem(itemId), 'Failed to get item');
    if (!item) {
      throw new NotFoundError('Item', { itemId });
    }
    if (item.sellerId !== session.userId) {
      throw ForbiddenError.notOwner(itemId);
    }
    return item;
  }
}
