import { Cart, CartItem, Item } from '@marketline/shared';

/**
 * Storage behind the catalog service.
 *
 * Every method is one atomic step on one key space. Nothing here spans two
 * keys, so a caller composing several calls (item insert followed by index
 * appends, read-modify-write of an item) gets no isolation between them.
 */
export interface CatalogRepository {
  putItem(item: Item): void;
  findItem(itemId: string): Item | null;
  listItems(): Item[];

  appendSellerIndex(sellerId: string, itemId: string): void;
  appendCategoryIndex(category: number, itemId: string): void;
  sellerItemIds(sellerId: string): string[];
  categoryItemIds(category: number): string[];

  findCart(buyerId: string): Cart | null;
  putCart(buyerId: string, cart: Cart): void;
  deleteCart(buyerId: string): void;
  /** Add to the line for `itemId`, creating it if absent */
  mergeCartLine(buyerId: string, itemId: string, quantity: number): void;
  /** Decrement the line for `itemId`, dropping it once it reaches zero */
  reduceCartLine(buyerId: string, itemId: string, quantity: number): void;

  appendPurchase(buyerId: string, itemId: string): void;
  purchases(buyerId: string): string[];
}

function cloneItem(item: Item): Item {
  return { ...item, keywords: [...item.keywords], feedback: { ...item.feedback } };
}

function cloneCart(cart: Cart): Cart {
  return cart.map((line): CartItem => ({ ...line }));
}

/**
 * Process-memory repository. Records are copied on the way in and out so
 * callers never hold a live reference into the maps.
 */
export class InMemoryCatalogRepository implements CatalogRepository {
  private readonly items = new Map<string, Item>();
  private readonly carts = new Map<string, Cart>();
  private readonly purchaseHistory = new Map<string, string[]>();
  private readonly sellerItems = new Map<string, string[]>();
  private readonly categoryItems = new Map<number, string[]>();

  putItem(item: Item): void {
    this.items.set(item.itemId, cloneItem(item));
  }

  findItem(itemId: string): Item | null {
    const item = this.items.get(itemId);
    return item ? cloneItem(item) : null;
  }

  listItems(): Item[] {
    return [...this.items.values()].map(cloneItem);
  }

  appendSellerIndex(sellerId: string, itemId: string): void {
    appendTo(this.sellerItems, sellerId, itemId);
  }

  appendCategoryIndex(category: number, itemId: string): void {
    appendTo(this.categoryItems, category, itemId);
  }

  sellerItemIds(sellerId: string): string[] {
    return [...(this.sellerItems.get(sellerId) ?? [])];
  }

  categoryItemIds(category: number): string[] {
    return [...(this.categoryItems.get(category) ?? [])];
  }

  findCart(buyerId: string): Cart | null {
    const cart = this.carts.get(buyerId);
    return cart ? cloneCart(cart) : null;
  }

  putCart(buyerId: string, cart: Cart): void {
    this.carts.set(buyerId, cloneCart(cart));
  }

  deleteCart(buyerId: string): void {
    this.carts.delete(buyerId);
  }

  mergeCartLine(buyerId: string, itemId: string, quantity: number): void {
    let cart = this.carts.get(buyerId);
    if (!cart) {
      cart = [];
      this.carts.set(buyerId, cart);
    }

    const line = cart.find((entry) => entry.itemId === itemId);
    if (line) {
      line.quantity += quantity;
    } else {
      cart.push({ itemId, quantity });
    }
  }

  reduceCartLine(buyerId: string, itemId: string, quantity: number): void {
    const cart = this.carts.get(buyerId);
    if (!cart) {
      return;
    }

    const index = cart.findIndex((entry) => entry.itemId === itemId);
    if (index === -1) {
      return;
    }

    if (cart[index].quantity <= quantity) {
      cart.splice(index, 1);
    } else {
      cart[index].quantity -= quantity;
    }
  }

  appendPurchase(buyerId: string, itemId: string): void {
    appendTo(this.purchaseHistory, buyerId, itemId);
  }

  purchases(buyerId: string): string[] {
    return [...(this.purchaseHistory.get(buyerId) ?? [])];
  }
}

function appendTo<K>(index: Map<K, string[]>, key: K, value: string): void {
  const entries = index.get(key);
  if (entries) {
    entries.push(value);
  } else {
    index.set(key, [value]);
  }
}
