export * from './session-validator';
