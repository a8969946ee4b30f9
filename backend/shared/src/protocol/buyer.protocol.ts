import Joi from 'joi';
import { Cart, ErrorFrame, Feedback, Item } from './types';
import { CommonFields, TaggedUnionSchema, cartSchema, feedbackSchema, itemSchema } from './schema';

export type BuyerRequest =
  | { type: 'CreateAccount'; buyerName: string; password: string }
  | { type: 'Login'; buyerName: string; password: string }
  | { type: 'Logout'; sessionId: string }
  | { type: 'SearchItemsForSale'; sessionId: string; category: number | null; keywords: string[] }
  | { type: 'GetItem'; sessionId: string; itemId: string }
  | { type: 'AddItemToCart'; sessionId: string; itemId: string; quantity: number }
  | { type: 'RemoveItemFromCart'; sessionId: string; itemId: string; quantity: number }
  | { type: 'SaveCart'; sessionId: string }
  | { type: 'ClearCart'; sessionId: string }
  | { type: 'DisplayCart'; sessionId: string }
  | { type: 'ProvideFeedback'; sessionId: string; itemId: string; thumbsUp: boolean }
  | { type: 'GetSellerRating'; sessionId: string; sellerId: string }
  | { type: 'GetBuyerPurchases'; sessionId: string };

export type BuyerResponse =
  | { type: 'CreateAccount'; buyerId: string }
  | { type: 'Login'; sessionId: string }
  | { type: 'Logout' }
  | { type: 'SearchItemsForSale'; items: Item[] }
  | { type: 'GetItem'; item: Item | null }
  | { type: 'AddItemToCart' }
  | { type: 'RemoveItemFromCart' }
  | { type: 'SaveCart' }
  | { type: 'ClearCart' }
  | { type: 'DisplayCart'; cart: Cart }
  | { type: 'ProvideFeedback' }
  | { type: 'GetSellerRating'; feedback: Feedback }
  | { type: 'GetBuyerPurchases'; itemIds: string[] }
  | ErrorFrame;

const session = { sessionId: CommonFields.id.required() };

export const buyerRequestSchema = new TaggedUnionSchema<BuyerRequest>({
  CreateAccount: { buyerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  Login: { buyerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  Logout: session,
  SearchItemsForSale: {
    ...session,
    category: CommonFields.category.allow(null).required(),
    keywords: CommonFields.keywords.required(),
  },
  GetItem: { ...session, itemId: CommonFields.id.required() },
  AddItemToCart: { ...session, itemId: CommonFields.id.required(), quantity: CommonFields.cartQuantity.required() },
  RemoveItemFromCart: { ...session, itemId: CommonFields.id.required(), quantity: CommonFields.cartQuantity.required() },
  SaveCart: session,
  ClearCart: session,
  DisplayCart: session,
  ProvideFeedback: { ...session, itemId: CommonFields.id.required(), thumbsUp: Joi.boolean().strict().required() },
  GetSellerRating: { ...session, sellerId: CommonFields.id.required() },
  GetBuyerPurchases: session,
});

export const buyerResponseSchema = new TaggedUnionSchema<BuyerResponse>({
  CreateAccount: { buyerId: CommonFields.id.required() },
  Login: { sessionId: CommonFields.id.required() },
  Logout: {},
  SearchItemsForSale: { items: Joi.array().items(itemSchema).required() },
  GetItem: { item: itemSchema.allow(null).required() },
  AddItemToCart: {},
  RemoveItemFromCart: {},
  SaveCart: {},
  ClearCart: {},
  DisplayCart: { cart: cartSchema.required() },
  ProvideFeedback: {},
  GetSellerRating: { feedback: feedbackSchema.required() },
  GetBuyerPurchases: { itemIds: Joi.array().items(CommonFields.id).required() },
  Error: { message: CommonFields.message.required() },
});
