import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Detection notification channels, loaded from YAML.
 */
export interface NotificationConfig {
  slack: { enabled: boolean; webhook_url: string };
  redis: { enabled: boolean; url: string; channel: string };
}

/** Every channel disabled. */
export const DEFAULT_CONFIG: NotificationConfig = {
  slack: { enabled: false, webhook_url: '' },
  redis: { enabled: false, url: 'redis://localhost:6379', channel: 'recorder_detections' },
};

type Scalar = string | boolean;

const slackSection = z.object({
  enabled: z.boolean().default(DEFAULT_CONFIG.slack.enabled),
  webhook_url: z.string().default(DEFAULT_CONFIG.slack.webhook_url),
});

const redisSection = z.object({
  enabled: z.boolean().default(DEFAULT_CONFIG.redis.enabled),
  url: z.string().min(1).default(DEFAULT_CONFIG.redis.url),
  channel: z.string().min(1).default(DEFAULT_CONFIG.redis.channel),
});

/**
 * Reads the two-level `section:` / `  key: value` layout used by
 * config/notifications.yaml. Scalars only; `true`/`false` become booleans
 * and surrounding quotes are stripped.
 */
function parseSections(content: string): Map<string, Record<string, Scalar>> {
  const sections = new Map<string, Record<string, Scalar>>();
  let current: Record<string, Scalar> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const indented = line.startsWith(' ') || line.startsWith('\t');
    const key = line.slice(0, colonIdx).trim();

    if (!indented) {
      current = {};
      sections.set(key, current);
      continue;
    }

    if (current === null) continue;
    current[key] = toScalar(line.slice(colonIdx + 1).trim());
  }

  return sections;
}

function toScalar(raw: string): Scalar {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw[0] ?? '')) {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Loads notification configuration from `configPath`.
 *
 * A missing or unreadable file yields DEFAULT_CONFIG. Within a file, each
 * section is validated on its own and an invalid section falls back to its
 * defaults.
 */
export function loadNotificationConfig(configPath: string): NotificationConfig {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const sections = parseSections(content);
  const slack = slackSection.safeParse(sections.get('slack') ?? {});
  const redis = redisSection.safeParse(sections.get('redis') ?? {});

  return {
    slack: slack.success ? slack.data : { ...DEFAULT_CONFIG.slack },
    redis: redis.success ? redis.data : { ...DEFAULT_CONFIG.redis },
  };
}
