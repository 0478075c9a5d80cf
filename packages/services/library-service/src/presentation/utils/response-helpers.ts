/**
 * Response helpers for library-service
 */

import { createResponseHelpers } from '@shelfwise/platform-core';
import { SERVICE_NAME } from '@config/service-config';

const helpers = createResponseHelpers(SERVICE_NAME);

export const { sendSuccess, sendCreated, sendEnvelope, ServiceErrors } = helpers;
