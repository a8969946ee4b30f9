/**
 * Catalog Service Client
 *
 * Typed wrapper over the catalog store's request/response frames.
 */

import { BaseServiceClient } from './base-service-client';
import { CatalogRequest, CatalogResponse, catalogResponseSchema } from '../protocol/catalog.protocol';
import { Cart, Item } from '../protocol/types';
import { ServiceAddress } from '../config/address';
import { Logger } from '../utils/logger';

export interface CatalogApi {
  createItem(item: Item): Promise<string>;
  updateItem(item: Item): Promise<void>;
  getItem(itemId: string): Promise<Item | null>;
  getItemsBySeller(sellerId: string): Promise<Item[]>;
  searchItems(category: number | null, keywords: string[]): Promise<Item[]>;
  addToCart(buyerId: string, itemId: string, quantity: number): Promise<void>;
  removeFromCart(buyerId: string, itemId: string, quantity: number): Promise<void>;
  getCart(buyerId: string): Promise<Cart>;
  saveCart(buyerId: string, cart: Cart): Promise<void>;
  clearCart(buyerId: string): Promise<void>;
  addPurchaseHistory(buyerId: string, itemId: string): Promise<void>;
  getPurchaseHistory(buyerId: string): Promise<string[]>;
}

export class CatalogServiceClient
  extends BaseServiceClient<CatalogRequest, CatalogResponse>
  implements CatalogApi {
  constructor(address: ServiceAddress, logger: Logger) {
    super({
      address,
      serviceName: 'catalog-service',
      responseSchema: catalogResponseSchema,
      logger,
    });
  }

  /**
   * @returns the identity assigned by the store; `item.itemId` is ignored
   */
  async createItem(item: Item): Promise<string> {
    const response = await this.call({ type: 'CreateItem', item }, 'ItemCreated');
    return response.itemId;
  }

  async updateItem(item: Item): Promise<void> {
    await this.call({ type: 'UpdateItem', item }, 'ItemUpdated');
  }

  async getItem(itemId: string): Promise<Item | null> {
    const response = await this.call({ type: 'GetItem', itemId }, 'Item');
    return response.item;
  }

  async getItemsBySeller(sellerId: string): Promise<Item[]> {
    const response = await this.call({ type: 'GetItemsBySeller', sellerId }, 'Items');
    return response.items;
  }

  async searchItems(category: number | null, keywords: string[]): Promise<Item[]> {
    const response = await this.call({ type: 'SearchItems', category, keywords }, 'Items');
    return response.items;
  }

  async addToCart(buyerId: string, itemId: string, quantity: number): Promise<void> {
    await this.call({ type: 'AddToCart', buyerId, itemId, quantity }, 'CartSaved');
  }

  async removeFromCart(buyerId: string, itemId: string, quantity: number): Promise<void> {
    await this.call({ type: 'RemoveFromCart', buyerId, itemId, quantity }, 'CartSaved');
  }

  async getCart(buyerId: string): Promise<Cart> {
    const response = await this.call({ type: 'GetCart', buyerId }, 'Cart');
    return response.cart;
  }

  async saveCart(buyerId: string, cart: Cart): Promise<void> {
    await this.call({ type: 'SaveCart', buyerId, cart }, 'CartSaved');
  }

  async clearCart(buyerId: string): Promise<void> {
    await this.call({ type: 'ClearCart', buyerId }, 'CartCleared');
  }

  async addPurchaseHistory(buyerId: string, itemId: string): Promise<void> {
    await this.call({ type: 'AddPurchaseHistory', buyerId, itemId }, 'PurchaseRecorded');
  }

  async getPurchaseHistory(buyerId: string): Promise<string[]> {
    const response = await this.call({ type: 'GetPurchaseHistory', buyerId }, 'PurchaseHistory');
    return response.itemIds;
  }
}
