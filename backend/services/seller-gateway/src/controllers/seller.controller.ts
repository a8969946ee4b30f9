import { SellerRequest, SellerResponse } from '@marketline/shared';
import { SellerService } from '../services/seller.service';

function assertNever(value: never): never {
  throw new Error(`Unhandled seller request: ${JSON.stringify(value)}`);
}

export class SellerController {
  constructor(private readonly sellers: SellerService) {}

  handle(request: SellerRequest): Promise<SellerResponse> {
    switch (request.type) {
      case 'CreateAccount':
        return this.sellers.createAccount(request);
      case 'Login':
        return this.sellers.login(request);
      case 'Logout':
        return this.sellers.logout(request);
      case 'GetSellerRating':
        return this.sellers.getSellerRating(request);
      case 'RegisterItemForSale':
        return this.sellers.registerItemForSale(request);
      case 'ChangeItemPrice':
        return this.sellers.changeItemPrice(request);
      case 'UpdateUnitsForSale':
        return this.sellers.updateUnitsForSale(request);
      case 'DisplayItemsForSale':
        return this.sellers.displayItemsForSale(request);
      default:
        return assertNever(request);
    }
  }
}
