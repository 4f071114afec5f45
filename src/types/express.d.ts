import type { SharedLogger } from '@officehours/shared';

import type { Caller } from '../application/services/bookingCoordinator';

declare global {
  namespace Express {
    // eslint-disable-next-line @typescript-eslint/consistent-type-definitions
    interface Locals {
      caller?: Caller;
      logger?: SharedLogger;
      logContext?: {
        traceId?: string;
        email?: string;
        queueId?: string;
      };
    }
  }
}

export {};
