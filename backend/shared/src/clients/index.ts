export * from './base-service-client';
export * from './catalog-service.client';
export * from './account-service.client';
