/**
 * One writer, one reader, a queue of two.
 *
 * The writer pushes 1..5 every 100ms while the reader drains more slowly,
 * so the queue fills up and the oldest unread values are dropped.
 *
 * Run with `npm run demo -w @overq/overwrite-queue`.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { pino } from "pino";

import { OverwriteQueue } from "../src/index.mjs";

const logger = pino({
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  },
  level: process.env.LOG_LEVEL ?? "info",
});

const queue = new OverwriteQueue<number>({ capacity: 2, name: "demo", logger });

async function writer(): Promise<void> {
  for (let value = 1; value <= 5; value++) {
    queue.push(value);
    logger.info({ value, count: queue.count() }, "push");
    if (value < 5) {
      await sleep(100);
    }
  }
}

async function reader(): Promise<void> {
  await sleep(150);
  logger.info({ value: await queue.pop() }, "pop");

  await sleep(150);
  logger.info({ value: await queue.pop() }, "pop");

  await sleep(150);
  const result = await queue.popWithTimeout(200);
  if (result.success) {
    logger.info({ value: result.data }, "popWithTimeout");
  } else {
    logger.warn(result.error.message);
  }
}

await Promise.all([writer(), reader()]);
