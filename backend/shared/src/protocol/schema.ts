import Joi from 'joi';
import { ValidationError } from '../errors';

/**
 * Common field validators
 */
export const CommonFields = {
  id: Joi.string().min(1).max(64),
  name: Joi.string().min(1).max(256),
  password: Joi.string().max(256),
  category: Joi.number().integer(),
  keywords: Joi.array().items(Joi.string()),
  condition: Joi.string().valid('New', 'Used'),
  price: Joi.number().min(0),
  units: Joi.number().integer().min(0),
  cartQuantity: Joi.number().integer().min(1),
  userType: Joi.string().valid('Buyer', 'Seller'),
  timestamp: Joi.number().integer(),
  message: Joi.string().allow(''),
};

export const feedbackSchema = Joi.object({
  thumbsUp: Joi.number().integer().min(0).required(),
  thumbsDown: Joi.number().integer().min(0).required(),
});

export const itemSchema = Joi.object({
  itemId: CommonFields.id.required(),
  sellerId: CommonFields.id.required(),
  itemName: CommonFields.name.required(),
  itemCategory: CommonFields.category.required(),
  keywords: CommonFields.keywords.required(),
  condition: CommonFields.condition.required(),
  salePrice: CommonFields.price.required(),
  quantity: CommonFields.units.required(),
  feedback: feedbackSchema.required(),
});

export const cartItemSchema = Joi.object({
  itemId: CommonFields.id.required(),
  quantity: CommonFields.cartQuantity.required(),
});

export const cartSchema = Joi.array().items(cartItemSchema);

export const sessionSchema = Joi.object({
  sessionId: CommonFields.id.required(),
  userId: CommonFields.id.required(),
  userType: CommonFields.userType.required(),
  expiration: CommonFields.timestamp.required(),
});

/**
 * Validator for a closed union of frames discriminated by `type`.
 *
 * Each variant lists only its payload keys; the `type` key is added here.
 * Unknown tags and unknown keys are rejected.
 */
export class TaggedUnionSchema<T extends { type: string }> {
  private readonly variants = new Map<string, Joi.ObjectSchema<T>>();

  constructor(variants: { [K in T['type']]: Joi.SchemaMap }) {
    const entries: Array<[string, Joi.SchemaMap]> = Object.entries(variants);
    for (const [tag, keys] of entries) {
      this.variants.set(
        tag,
        Joi.object<T>({ type: Joi.string().valid(tag).required(), ...keys })
      );
    }
  }

  get tags(): string[] {
    return [...this.variants.keys()];
  }

  validate(value: unknown): T {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ValidationError('frame must be a JSON object');
    }
    if (!('type' in value) || typeof value.type !== 'string') {
      throw new ValidationError('"type" must be a string');
    }

    const schema = this.variants.get(value.type);
    if (!schema) {
      throw new ValidationError(`unknown type "${value.type}"`, { type: value.type });
    }

    const result = schema.validate(value);
    if (result.error) {
      throw new ValidationError(result.error.message, { type: value.type });
    }
    return result.value;
  }
}
