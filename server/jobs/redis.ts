import IORedis, { type Redis } from "ioredis";
import { withSource } from "../logger";
import { toError } from "../types/errors";

const log = withSource("redis");

export function createRedis(url: string): Redis {
  return new IORedis(url, {
    maxRetriesPerRequest: null, // bullmq workers issue blocking commands
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

export async function closeRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    log.warn({ err: toError(err).message }, "redis quit failed; disconnecting");
    client.disconnect();
  }
}
