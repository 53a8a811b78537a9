import { MonitorConfig } from './types.js';

export const DEFAULT_WEBSITE_URL =
  'https://www.lingen.de/bauen-wirtschaft/wohnbaugebiete/aktuelle-grundstuecksvergabe/brockhausen-1.html';
export const DEFAULT_STATE_PATH = 'last_pdf_links.json';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; Lingen-PDF-Monitor/1.0; +github-actions)';
export const DEFAULT_TITLE = 'Lingen PDF Monitor';
export const DEFAULT_TIMEOUT_MS = 30000;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): MonitorConfig {
  const timeoutMs = parseInt(env.TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS), 10);
  return {
    websiteUrl: env.WEBSITE_URL || DEFAULT_WEBSITE_URL,
    statePath: env.STATE_PATH || DEFAULT_STATE_PATH,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS,
    pushover: {
      userKey: env.PUSHOVER_USER_KEY || undefined,
      appToken: env.PUSHOVER_APP_TOKEN || undefined,
      title: env.PUSHOVER_TITLE || DEFAULT_TITLE
    }
  };
}
