/**
 * Contract of the account/session store. The store itself runs elsewhere;
 * gateways only issue these requests to it.
 */

import { Buyer, ErrorFrame, Seller, Session, UserType } from './types';
import { CommonFields, TaggedUnionSchema, feedbackSchema, sessionSchema } from './schema';
import Joi from 'joi';

export type AccountRequest =
  | { type: 'CreateBuyer'; buyerName: string; password: string }
  | { type: 'CreateSeller'; sellerName: string; password: string }
  | { type: 'GetBuyerByName'; buyerName: string }
  | { type: 'GetSellerByName'; sellerName: string }
  | { type: 'GetSeller'; sellerId: string }
  | { type: 'CreateSession'; userId: string; userType: UserType }
  | { type: 'GetSession'; sessionId: string }
  | { type: 'DeleteSession'; sessionId: string };

export type AccountResponse =
  | { type: 'BuyerCreated'; buyerId: string }
  | { type: 'SellerCreated'; sellerId: string }
  | { type: 'Buyer'; buyer: Buyer | null }
  | { type: 'Seller'; seller: Seller | null }
  | { type: 'SessionCreated'; sessionId: string; expiration: number }
  | { type: 'Session'; session: Session | null }
  | { type: 'SessionDeleted' }
  | ErrorFrame;

const buyerSchema = Joi.object({
  buyerId: CommonFields.id.required(),
  buyerName: CommonFields.name.required(),
  password: CommonFields.password.allow('').required(),
});

const sellerSchema = Joi.object({
  sellerId: CommonFields.id.required(),
  sellerName: CommonFields.name.required(),
  password: CommonFields.password.allow('').required(),
  feedback: feedbackSchema.required(),
});

export const accountRequestSchema = new TaggedUnionSchema<AccountRequest>({
  CreateBuyer: { buyerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  CreateSeller: { sellerName: CommonFields.name.required(), password: CommonFields.password.allow('').required() },
  GetBuyerByName: { buyerName: CommonFields.name.required() },
  GetSellerByName: { sellerName: CommonFields.name.required() },
  GetSeller: { sellerId: CommonFields.id.required() },
  CreateSession: { userId: CommonFields.id.required(), userType: CommonFields.userType.required() },
  GetSession: { sessionId: CommonFields.id.required() },
  DeleteSession: { sessionId: CommonFields.id.required() },
});

export const accountResponseSchema = new TaggedUnionSchema<AccountResponse>({
  BuyerCreated: { buyerId: CommonFields.id.required() },
  SellerCreated: { sellerId: CommonFields.id.required() },
  Buyer: { buyer: buyerSchema.allow(null).required() },
  Seller: { seller: sellerSchema.allow(null).required() },
  SessionCreated: { sessionId: CommonFields.id.required(), expiration: CommonFields.timestamp.required() },
  Session: { session: sessionSchema.allow(null).required() },
  SessionDeleted: {},
  Error: { message: CommonFields.message.required() },
});
