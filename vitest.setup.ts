/**
 * Vitest setup: keep test output free of log lines
 */

import { logger } from "@deepresearch/core";

logger.resetHandlers(false);
