import { createServiceLogger } from '@marketline/shared';

export const logger = createServiceLogger('buyer-gateway');
