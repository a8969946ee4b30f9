import { BuyerRequest, BuyerResponse } from '@marketline/shared';
import { BuyerService } from '../services/buyer.service';

function assertNever(value: never): never {
  throw new Error(`Unhandled buyer request: ${JSON.stringify(value)}`);
}

export class BuyerController {
  constructor(private readonly buyers: BuyerService) {}

  handle(request: BuyerRequest): Promise<BuyerResponse> {
    switch (request.type) {
      case 'CreateAccount':
        return this.buyers.createAccount(request);
      case 'Login':
        return this.buyers.login(request);
      case 'Logout':
        return this.buyers.logout(request);
      case 'SearchItemsForSale':
        return this.buyers.searchItemsForSale(request);
      case 'GetItem':
        return this.buyers.getItem(request);
      case 'AddItemToCart':
        return this.buyers.addItemToCart(request);
      case 'RemoveItemFromCart':
        return this.buyers.removeItemFromCart(request);
      case 'SaveCart':
        return this.buyers.saveCart(request);
      case 'ClearCart':
        return this.buyers.clearCart(request);
      case 'DisplayCart':
        return this.buyers.displayCart(request);
      case 'ProvideFeedback':
        return this.buyers.provideFeedback(request);
      case 'GetSellerRating':
        return this.buyers.getSellerRating(request);
      case 'GetBuyerPurchases':
        return this.buyers.getBuyerPurchases(request);
      default:
        return assertNever(request);
    }
  }
}
