export * from './gateway-service';
