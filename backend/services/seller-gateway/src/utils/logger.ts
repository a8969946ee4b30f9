import { createServiceLogger } from '@marketline/shared';

export const logger = createServiceLogger('seller-gateway');
