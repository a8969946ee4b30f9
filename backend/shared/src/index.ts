// ============================================================================
// PROTOCOL
// ============================================================================

// Domain records, frame unions and their schemas
export * from './protocol';

// ============================================================================
// TRANSPORT
// ============================================================================

// Line framing, accept loop and one-shot outbound calls
export * from './transport';

// Typed clients for the catalog and account stores
export * from './clients';

// ============================================================================
// CROSS-CUTTING
// ============================================================================

// Error types
export * from './errors';

// Session validation and the base class shared by both gateways
export * from './session';
export * from './gateway';

// Addresses
export * from './config';

// Logging
export { createServiceLogger, createConnectionLogger } from './utils/logger';
export type { Logger } from './utils/logger';
