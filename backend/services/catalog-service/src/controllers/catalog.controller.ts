import { CatalogRequest, CatalogResponse } from '@marketline/shared';
import { CatalogService } from '../services/catalog.service';

function assertNever(value: never): never {
  throw new Error(`Unhandled catalog request: ${JSON.stringify(value)}`);
}

/**
 * Maps one catalog frame onto the service. Domain failures are thrown and
 * turned into Error frames by the line server.
 */
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  async handle(request: CatalogRequest): Promise<CatalogResponse> {
    switch (request.type) {
      case 'CreateItem':
        return { type: 'ItemCreated', itemId: this.catalog.createItem(request.item) };

      case 'UpdateItem':
        this.catalog.updateItem(request.item);
        return { type: 'ItemUpdated' };

      case 'GetItem':
        return { type: 'Item', item: this.catalog.getItem(request.itemId) };

      case 'GetItemsBySeller':
        return { type: 'Items', items: this.catalog.getItemsBySeller(request.sellerId) };

      case 'SearchItems':
        return {
          type: 'Items',
          items: this.catalog.searchItems({ category: request.category, keywords: request.keywords }),
        };

      case 'AddToCart':
        this.catalog.addToCart(request.buyerId, request.itemId, request.quantity);
        return { type: 'CartSaved' };

      case 'RemoveFromCart':
        this.catalog.removeFromCart(request.buyerId, request.itemId, request.quantity);
        return { type: 'CartSaved' };

      case 'GetCart':
        return { type: 'Cart', cart: this.catalog.getCart(request.buyerId) };

      case 'SaveCart':
        this.catalog.saveCart(request.buyerId, request.cart);
        return { type: 'CartSaved' };

      case 'ClearCart':
        this.catalog.clearCart(request.buyerId);
        return { type: 'CartCleared' };

      case 'AddPurchaseHistory':
        this.catalog.recordPurchase(request.buyerId, request.itemId);
        return { type: 'PurchaseRecorded' };

      case 'GetPurchaseHistory':
        return { type: 'PurchaseHistory', itemIds: this.catalog.getPurchaseHistory(request.buyerId) };

      default:
        return assertNever(request);
    }
  }
}
