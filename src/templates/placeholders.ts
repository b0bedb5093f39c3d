import type { MaintenanceRequest } from '../models';

export const PLACEHOLDER_NAMES = [
  'REQUEST_ID',
  'TIMESTAMP',
  'PATH',
  'METHOD',
  'SOURCE_IP',
  'USER_AGENT',
  'HOST',
  'FUNCTION_NAME',
] as const;

export type PlaceholderName = (typeof PLACEHOLDER_NAMES)[number];

export type PlaceholderValues = Record<PlaceholderName, string>;

const KNOWN_NAMES = new Set<string>(PLACEHOLDER_NAMES);

const TOKEN_PATTERN = /\{\{([A-Z_]+)\}\}/g;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
  '{': '&#123;',
  '}': '&#125;',
};

function isPlaceholderName(name: string): name is PlaceholderName {
  return KNOWN_NAMES.has(name);
}

// Braces are escaped too, so a substituted value can never form a new token
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"'{}]/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function placeholderValues(request: MaintenanceRequest, now: Date): PlaceholderValues {
  return {
    REQUEST_ID: request.requestId,
    TIMESTAMP: now.toISOString(),
    PATH: request.path,
    METHOD: request.method,
    SOURCE_IP: request.sourceIp,
    USER_AGENT: request.headers['user-agent'] ?? '',
    HOST: request.headers['host'] ?? '',
    FUNCTION_NAME: request.functionName,
  };
}

/**
 * Replaces every recognized `{{NAME}}` token with its HTML-escaped value in a
 * single pass. Unknown tokens are left as they are.
 */
export function substitutePlaceholders(document: string, values: PlaceholderValues): string {
  return document.replace(TOKEN_PATTERN, (token: string, name: string) =>
    isPlaceholderName(name) ? escapeHtml(values[name]) : token,
  );
}
