/**
 * Domain records carried on the wire between marketplace services.
 */

export type UserType = 'Buyer' | 'Seller';

export type ItemCondition = 'New' | 'Used';

export interface Feedback {
  thumbsUp: number;
  thumbsDown: number;
}

export interface Item {
  itemId: string;
  sellerId: string;
  itemName: string;
  itemCategory: number;
  /** Capped at 5 entries of 8 characters by the producing client, not by the store */
  keywords: string[];
  condition: ItemCondition;
  salePrice: number;
  /** Listed units; checked by cart adds but never decremented */
  quantity: number;
  feedback: Feedback;
}

export interface CartItem {
  itemId: string;
  quantity: number;
}

export type Cart = CartItem[];

export interface Session {
  sessionId: string;
  userId: string;
  userType: UserType;
  /** Absolute Unix time in seconds */
  expiration: number;
}

export interface Buyer {
  buyerId: string;
  buyerName: string;
  password: string;
}

export interface Seller {
  sellerId: string;
  sellerName: string;
  password: string;
  feedback: Feedback;
}

export interface ErrorFrame {
  type: 'Error';
  message: string;
}
