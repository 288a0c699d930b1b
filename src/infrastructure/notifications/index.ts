export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { toNotificationPayload } from './payload.js';
export type { DetectionNotificationPayload } from './payload.js';
export { sendSlackNotification, SlackDetectionHandler } from './slack.js';
export { publishDetection, RedisDetectionHandler } from './redis-publisher.js';
export type { DetectionPublisher } from './redis-publisher.js';
