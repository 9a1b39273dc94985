import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  stream: { enabled: boolean };
  webhook: { enabled: boolean; url: string; timeout_ms: number };
  alerts: { recipient: string };
}

/**
 * Defaults: live stream enabled, webhook disabled (alerts go to the log
 * notifier).
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  stream: { enabled: true },
  webhook: { enabled: false, url: '', timeout_ms: 5000 },
  alerts: { recipient: 'alerts@example.com' },
};

type YamlScalar = string | boolean;

/**
 * Minimal YAML parser for the flat notification config structure.
 *
 * Handles only the subset of YAML used in config/notifications.yaml:
 * top-level section keys with indented scalar values.
 */
function parseSimpleYaml(content: string): Record<string, Record<string, YamlScalar>> {
  const result: Record<string, Record<string, YamlScalar>> = {};
  let currentSection: Record<string, YamlScalar> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      currentSection = {};
      result[line.slice(0, colonIdx).trim()] = currentSection;
      continue;
    }

    if (currentSection === null) continue;

    const key = line.slice(0, colonIdx).trim();
    const raw = line.slice(colonIdx + 1).trim();

    if (raw === 'true') {
      currentSection[key] = true;
    } else if (raw === 'false') {
      currentSection[key] = false;
    } else if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
      currentSection[key] = raw.slice(1, -1);
    } else {
      currentSection[key] = raw;
    }
  }

  return result;
}

function readBoolean(section: Record<string, YamlScalar>, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(section: Record<string, YamlScalar>, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

function readPositiveInt(section: Record<string, YamlScalar>, key: string, fallback: number): number {
  const value = section[key];
  if (typeof value !== 'string') return fallback;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Merges loaded values over defaults so missing keys get default values.
 */
export function loadNotificationConfig(
  configPath?: string,
): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  const stream = parsed['stream'] ?? {};
  const webhook = parsed['webhook'] ?? {};
  const alerts = parsed['alerts'] ?? {};

  return {
    stream: {
      enabled: readBoolean(stream, 'enabled', DEFAULT_CONFIG.stream.enabled),
    },
    webhook: {
      enabled: readBoolean(webhook, 'enabled', DEFAULT_CONFIG.webhook.enabled),
      url: readString(webhook, 'url', DEFAULT_CONFIG.webhook.url),
      timeout_ms: readPositiveInt(webhook, 'timeout_ms', DEFAULT_CONFIG.webhook.timeout_ms),
    },
    alerts: {
      recipient: readString(alerts, 'recipient', DEFAULT_CONFIG.alerts.recipient) || DEFAULT_CONFIG.alerts.recipient,
    },
  };
}
