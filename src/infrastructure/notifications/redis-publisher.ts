import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { DetectionContext, DetectionHandler } from '../../application/detection-handler.js';
import type { DetectionNotificationPayload } from './payload.js';
import { toNotificationPayload } from './payload.js';

export type DetectionPublisher = Pick<Redis, 'publish'>;

/**
 * Publishes a detection to a Redis Pub/Sub channel.
 *
 * Best-effort: publish failures are logged and never reach the consumer loop.
 */
export async function publishDetection(
  redis: DetectionPublisher,
  channel: string,
  log: Logger,
  payload: DetectionNotificationPayload,
): Promise<void> {
  try {
    const receivers = await redis.publish(channel, JSON.stringify(payload));
    log.debug({ channel, source: payload.source, receivers }, 'Detection published');
  } catch (err: unknown) {
    log.warn({ err, channel, source: payload.source }, 'Failed to publish detection');
  }
}

export class RedisDetectionHandler implements DetectionHandler {
  readonly name = 'redis';

  constructor(
    private readonly redis: DetectionPublisher,
    private readonly channel: string,
    private readonly log: Logger,
  ) {}

  handle(context: DetectionContext): Promise<void> {
    return publishDetection(this.redis, this.channel, this.log, toNotificationPayload(context));
  }
}
