export * from './frame-codec';
export * from './line-server';
export * from './send-request';
