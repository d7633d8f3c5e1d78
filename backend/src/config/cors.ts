import { config, isDevelopment } from './app.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }

  try {
    const url = new URL(trimmed);
    const port = url.port ? `:${url.port}` : '';
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

function isLoopbackOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    return LOOPBACK_HOSTS.has(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

export function parseAllowedOrigins(raw: string): string[] {
  const origins = raw
    .split(',')
    .map((origin) => normalizeOrigin(origin))
    .filter(Boolean);
  return Array.from(new Set(origins));
}

export const allowedOrigins = parseAllowedOrigins(config.CORS_ORIGIN);
const allowedOriginsSet = new Set(allowedOrigins);

export function isOriginAllowed(origin?: string | null): boolean {
  if (!origin) {
    return true;
  }

  if (allowedOriginsSet.has(normalizeOrigin(origin))) {
    return true;
  }

  // Vite and friends hop between localhost ports during development
  return isDevelopment && isLoopbackOrigin(origin);
}
