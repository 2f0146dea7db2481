import { pino } from "pino";

import type { Logger } from "pino";

export type { Logger };

/**
 * Logger used by queues that are not given one.
 * Silent unless OVERWRITE_QUEUE_LOG_LEVEL is set, e.g. `OVERWRITE_QUEUE_LOG_LEVEL=debug`.
 */
export const defaultLogger: Logger = pino({
  name: "overwrite-queue",
  level: process.env.OVERWRITE_QUEUE_LOG_LEVEL ?? "silent",
});
