export * from './types';
export * from './schema';
export * from './catalog.protocol';
export * from './account.protocol';
export * from './buyer.protocol';
export * from './seller.protocol';
