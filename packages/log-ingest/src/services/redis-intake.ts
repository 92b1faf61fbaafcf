import type { Redis } from "ioredis";
import { createLogger } from "@logfeed/shared/utils";

import type { IngestionPipeline } from "./pipeline.js";

const logger = createLogger("redis-intake");

export const INTAKE_PATTERN = "logs:*";
const CHANNEL_PREFIX = "logs:";

/**
 * Feeds records published on `logs:<service>` channels into the pipeline.
 * The channel suffix stands in for `service` when the payload has none.
 */
export class RedisIntake {
  private subscriber: Redis | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly redis: Redis,
    private readonly pipeline: Pick<IngestionPipeline, "submit">,
  ) {}

  async start(): Promise<void> {
    if (this.subscriber) return;

    const subscriber = this.redis.duplicate();
    subscriber.on("pmessage", (_pattern: string, channel: string, message: string) => {
      const task: Promise<void> = this.handle(channel, message).finally(() => {
        this.inFlight.delete(task);
      });
      this.inFlight.add(task);
    });

    await subscriber.psubscribe(INTAKE_PATTERN);
    this.subscriber = subscriber;
    logger.info({ pattern: INTAKE_PATTERN }, "Subscribed to Redis log channels");
  }

  async stop(): Promise<void> {
    const subscriber = this.subscriber;
    if (!subscriber) return;
    this.subscriber = null;

    try {
      await subscriber.punsubscribe(INTAKE_PATTERN);
    } catch (err) {
      logger.error({ err }, "Failed to unsubscribe from Redis log channels");
    }
    subscriber.disconnect();

    await Promise.all([...this.inFlight]);
    logger.info("Redis intake stopped");
  }

  private async handle(channel: string, message: string): Promise<void> {
    let payload: unknown;
    try {
      payload = JSON.parse(message);
    } catch (err) {
      logger.error({ err, channel }, "Failed to parse Redis log message");
      return;
    }

    const channelService = channel.startsWith(CHANNEL_PREFIX) ? channel.slice(CHANNEL_PREFIX.length) : "";
    const record =
      typeof payload === "object" && payload !== null && !Array.isArray(payload) && !("service" in payload) && channelService
        ? { ...payload, service: channelService }
        : payload;

    try {
      const outcome = await this.pipeline.submit(record);
      if (outcome.status === "rejected") {
        logger.debug({ channel, id: outcome.id, stage: outcome.stage }, "Redis log record rejected");
      }
    } catch (err) {
      logger.error({ err, channel }, "Redis log record submission threw");
    }
  }
}
