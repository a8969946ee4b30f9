import Joi from 'joi';
import { ErrorFrame, Feedback, Item, ItemCondition } from './types';
import { CommonFields, TaggedUnionSchema, feedbackSchema, itemSchema } from './schema';

export type SellerRequest =
  | { type: 'CreateAccount'; sellerName: string; password: string }
  | { type: 'Login'; sellerName: string; password: string }
  | { type: 'Logout'; sessionId: string }
  | { type: 'GetSellerRating'; sessionId: string }
  | {
      type: 'RegisterItemForSale';
      sessionId: string;
      itemName: string;
      itemCategory: number;
      keywords: string[];
      condition: ItemCondition;
      salePrice: number;
      quantity: number;
    }
  | { type: 'ChangeItemPrice'; sessionId: string; itemId: string; newPrice: number }
  | { type: 'UpdateUnitsForSale'; sessionId: string; itemId: string; quantity: number }
  | { type: 'DisplayItemsForSale'; sessionId: string };

export type SellerResponse =
  | { type: 'CreateAccount'; sellerId: string }
  | { type: 'Login'; sessionId: string }
  | { type: 'Logout' }
  | { type: 'GetSellerRating'; feedback: Feedback }
  | { type: 'RegisterItemForSale'; itemId: string }
  | { type: 'ChangeItemPrice' }
  | { type: 'UpdateUnitsForSale' }
  | { type: 'DisplayItemsForSale'; items: Item[] }
  | ErrorFrame;

const session = { sessionId: CommonFields.id.required() };

export const sellerRequestSchema = new TaggedUnionSchema<SellerRequest>({
  CreateAccount: { sellerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  Login: { sellerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  Logout: session,
  GetSellerRating: session,
  RegisterItemForSale: {
    ...session,
    itemName: CommonFields.name.required(),
    itemCategory: CommonFields.category.required(),
    keywords: CommonFields.keywords.required(),
    condition: CommonFields.condition.required(),
    salePrice: CommonFields.price.required(),
    quantity: CommonFields.units.required(),
  },
  ChangeItemPrice: { ...session, itemId: CommonFields.id.required(), newPrice: CommonFields.price.required() },
  UpdateUnitsForSale: { ...session, itemId: CommonFields.id.required(), quantity: CommonFields.units.required() },
  DisplayItemsForSale: session,
});

export const sellerResponseSchema = new TaggedUnionSchema<SellerResponse>({
  CreateAccount: { sellerId: CommonFields.id.required() },
  Login: { sessionId: CommonFields.id.required() },
  Logout: {},
  GetSellerRating: { feedback: feedbackSchema.required() },
  RegisterItemForSale: { itemId: CommonFields.id.required() },
  ChangeItemPrice: {},
  UpdateUnitsForSale: {},
  DisplayItemsForSale: { items: Joi.array().items(itemSchema).required() },
  Error: { message: CommonFields.message.required() },
});
