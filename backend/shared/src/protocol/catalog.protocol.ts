import Joi from 'joi';
import { Cart, ErrorFrame, Item } from './types';
import { CommonFields, TaggedUnionSchema, cartSchema, itemSchema } from './schema';

// ============================================================================
// Requests
// ============================================================================

export type CatalogRequest =
  | { type: 'CreateItem'; item: Item }
  | { type: 'UpdateItem'; item: Item }
  | { type: 'GetItem'; itemId: string }
  | { type: 'GetItemsBySeller'; sellerId: string }
  | { type: 'SearchItems'; category: number | null; keywords: string[] }
  | { type: 'AddToCart'; buyerId: string; itemId: string; quantity: number }
  | { type: 'RemoveFromCart'; buyerId: string; itemId: string; quantity: number }
  | { type: 'GetCart'; buyerId: string }
  | { type: 'SaveCart'; buyerId: string; cart: Cart }
  | { type: 'ClearCart'; buyerId: string }
  | { type: 'AddPurchaseHistory'; buyerId: string; itemId: string }
  | { type: 'GetPurchaseHistory'; buyerId: string };

// ============================================================================
// Responses
// ============================================================================

export type CatalogResponse =
  | { type: 'ItemCreated'; itemId: string }
  | { type: 'ItemUpdated' }
  | { type: 'Item'; item: Item | null }
  | { type: 'Items'; items: Item[] }
  | { type: 'CartSaved' }
  | { type: 'Cart'; cart: Cart }
  | { type: 'CartCleared' }
  | { type: 'PurchaseRecorded' }
  | { type: 'PurchaseHistory'; itemIds: string[] }
  | ErrorFrame;

// ============================================================================
// Schemas
// ============================================================================

export const catalogRequestSchema = new TaggedUnionSchema<CatalogRequest>({
  CreateItem: { item: itemSchema.required() },
  UpdateItem: { item: itemSchema.required() },
  GetItem: { itemId: CommonFields.id.required() },
  GetItemsBySeller: { sellerId: CommonFields.id.required() },
  SearchItems: {
    category: CommonFields.category.allow(null).required(),
    keywords: CommonFields.keywords.required(),
  },
  AddToCart: {
    buyerId: CommonFields.id.required(),
    itemId: CommonFields.id.required(),
    quantity: CommonFields.cartQuantity.required(),
  },
  RemoveFromCart: {
    buyerId: CommonFields.id.required(),
    itemId: CommonFields.id.required(),
    quantity: CommonFields.cartQuantity.required(),
  },
  GetCart: { buyerId: CommonFields.id.required() },
  SaveCart: { buyerId: CommonFields.id.required(), cart: cartSchema.required() },
  ClearCart: { buyerId: CommonFields.id.required() },
  AddPurchaseHistory: { buyerId: CommonFields.id.required(), itemId: CommonFields.id.required() },
  GetPurchaseHistory: { buyerId: CommonFields.id.required() },
});

export const catalogResponseSchema = new TaggedUnionSchema<CatalogResponse>({
  ItemCreated: { itemId: CommonFields.id.required() },
  ItemUpdated: {},
  Item: { item: itemSchema.allow(null).required() },
  Items: { items: Joi.array().items(itemSchema).required() },
  CartSaved: {},
  Cart: { cart: cartSchema.required() },
  CartCleared: {},
  PurchaseRecorded: {},
  PurchaseHistory: { itemIds: Joi.array().items(CommonFields.id).required() },
  Error: { message: CommonFields.message.required() },
});
