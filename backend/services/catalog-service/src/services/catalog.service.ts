import { v4 as uuidv4 } from 'uuid';
import { Cart, InsufficientQuantityError, Item, NotFoundError } from '@marketline/shared';
import { CatalogRepository } from '../repositories/catalog.repository';

export interface SearchCriteria {
  category: number | null;
  keywords: string[];
}

function countMatches(item: Item, keywords: string[]): number {
  return keywords.filter((keyword) => item.keywords.includes(keyword)).length;
}

export class CatalogService {
  constructor(private readonly repository: CatalogRepository) {}

  /**
   * Insert under a fresh identity, then index by seller and by category.
   * Whatever `itemId` the caller sent is discarded.
   */
  createItem(item: Item): string {
    const itemId = uuidv4();
    const created: Item = { ...item, itemId };

    this.repository.putItem(created);
    this.repository.appendSellerIndex(created.sellerId, itemId);
    this.repository.appendCategoryIndex(created.itemCategory, itemId);

    return itemId;
  }

  /**
   * Overwrite in place. Indexes are not touched, so seller and category are
   * assumed not to change after creation.
   */
  updateItem(item: Item): void {
    this.repository.putItem(item);
  }

  getItem(itemId: string): Item | null {
    return this.repository.findItem(itemId);
  }

  getItemsBySeller(sellerId: string): Item[] {
    return this.resolve(this.repository.sellerItemIds(sellerId));
  }

  /**
   * Every keyword must appear verbatim in the item's keyword list. Results
   * are ranked by how many of the keywords they contain; since every result
   * contains all of them, repeats included, ranks tie and scan order stays.
   */
  searchItems({ category, keywords }: SearchCriteria): Item[] {
    const candidates = category === null
      ? this.repository.listItems()
      : this.resolve(this.repository.categoryItemIds(category));

    const matches = candidates.filter((item) =>
      keywords.every((keyword) => item.keywords.includes(keyword))
    );

    return matches.sort((a, b) => countMatches(b, keywords) - countMatches(a, keywords));
  }

  /**
   * The listed quantity is a ceiling per call; it is never decremented or
   * reserved, so repeated adds can exceed it in total.
   */
  addToCart(buyerId: string, itemId: string, quantity: number): void {
    const item = this.repository.findItem(itemId);
    if (!item) {
      throw new NotFoundError('Item', { itemId });
    }
    if (item.quantity < quantity) {
      throw new InsufficientQuantityError(quantity, item.quantity);
    }

    this.repository.mergeCartLine(buyerId, itemId, quantity);
  }

  removeFromCart(buyerId: string, itemId: string, quantity: number): void {
    this.repository.reduceCartLine(buyerId, itemId, quantity);
  }

  getCart(buyerId: string): Cart {
    return this.repository.findCart(buyerId) ?? [];
  }

  saveCart(buyerId: string, cart: Cart): void {
    this.repository.putCart(buyerId, cart);
  }

  clearCart(buyerId: string): void {
    this.repository.deleteCart(buyerId);
  }

  recordPurchase(buyerId: string, itemId: string): void {
    this.repository.appendPurchase(buyerId, itemId);
  }

  getPurchaseHistory(buyerId: string): string[] {
    return this.repository.purchases(buyerId);
  }

  private resolve(itemIds: string[]): Item[] {
    const items: Item[] = [];
    for (const itemId of itemIds) {
      const item = this.repository.findItem(itemId);
      if (item) {
        items.push(item);
      }
    }
    return items;
  }
}
