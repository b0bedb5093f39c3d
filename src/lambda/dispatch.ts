import { STATUS_CODES } from 'http';
import { z } from 'zod';
import type { MaintenanceConfig, MaintenanceRequest, MaintenanceResponse } from '../models';
import type { DownstreamInvoker } from '../services/downstream';
import type { MaintenancePageStore } from '../services/storage';
import { FALLBACK_MAINTENANCE_PAGE } from '../templates/fallbackPage';
import { placeholderValues, substitutePlaceholders } from '../templates/placeholders';

export interface DispatchDependencies {
  pageStore: MaintenancePageStore;
  downstream: DownstreamInvoker;
  now: () => Date;
}

export const NORMAL_OPERATION_BODY = JSON.stringify({ message: 'Service is operational' });
export const BAD_GATEWAY_BODY = JSON.stringify({ error: 'Downstream function unavailable' });

const headerValue = z.union([z.string(), z.number(), z.boolean()]);

// What the downstream function has to return for its response to be relayed
const downstreamResponseSchema = z.object({
  statusCode: z.number().int().min(100).max(599),
  statusDescription: z.string().optional(),
  headers: z.record(headerValue).optional(),
  multiValueHeaders: z.record(z.array(headerValue)).optional(),
  body: z.string().optional(),
  isBase64Encoded: z.boolean().optional(),
});

export function statusDescription(statusCode: number): string {
  return `${statusCode} ${STATUS_CODES[statusCode] ?? 'Unknown'}`;
}

export function isSpecialPath(path: string, config: MaintenanceConfig): boolean {
  return config.specialPrefix !== '' && path.startsWith(config.specialPrefix);
}

function jsonResponse(statusCode: number, body: string): MaintenanceResponse {
  return {
    statusCode,
    statusDescription: statusDescription(statusCode),
    isBase64Encoded: false,
    headers: { 'Content-Type': 'application/json' },
    body,
  };
}

async function relayDownstream(
  request: MaintenanceRequest,
  config: MaintenanceConfig,
  deps: DispatchDependencies,
): Promise<MaintenanceResponse> {
  const payload = {
    event: request.event,
    context: {
      function_name: request.functionName,
      function_version: request.functionVersion,
      request_id: request.requestId,
      memory_limit_in_mb: request.memoryLimitInMB,
    },
  };

  let raw: unknown;
  try {
    raw = await deps.downstream.invoke(config.downstreamRef, payload);
  } catch (error) {
    console.error(`Request ${request.requestId}: downstream invocation failed:`, error);
    return jsonResponse(502, BAD_GATEWAY_BODY);
  }

  const parsed = downstreamResponseSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(
      `Request ${request.requestId}: malformed downstream response:`,
      parsed.error.issues,
    );
    return jsonResponse(502, BAD_GATEWAY_BODY);
  }

  const result = parsed.data;
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(result.headers ?? {})) {
    headers[name] = String(value);
  }

  const response: MaintenanceResponse = {
    statusCode: result.statusCode,
    statusDescription: result.statusDescription ?? statusDescription(result.statusCode),
    isBase64Encoded: result.isBase64Encoded ?? false,
    headers,
    body: result.body ?? '',
  };

  if (result.multiValueHeaders) {
    const multiValueHeaders: Record<string, string[]> = {};
    for (const [name, values] of Object.entries(result.multiValueHeaders)) {
      multiValueHeaders[name] = values.map(String);
    }
    response.multiValueHeaders = multiValueHeaders;
  }

  return response;
}

async function maintenancePage(
  request: MaintenanceRequest,
  config: MaintenanceConfig,
  deps: DispatchDependencies,
): Promise<MaintenanceResponse> {
  let document: string;
  try {
    document = await deps.pageStore.fetch(config.storage);
  } catch (error) {
    console.error(`Request ${request.requestId}: serving fallback maintenance page:`, error);
    document = FALLBACK_MAINTENANCE_PAGE;
  }

  const headers: Record<string, string> = {
    'Content-Type': 'text/html; charset=utf-8',
  };
  if (config.retryAfter !== '') {
    headers['Retry-After'] = config.retryAfter;
  }

  return {
    statusCode: 503,
    statusDescription: statusDescription(503),
    isBase64Encoded: false,
    headers,
    body: substitutePlaceholders(document, placeholderValues(request, deps.now())),
  };
}

/**
 * Routes one request: special path first, then maintenance mode, then normal
 * operation. Collaborator failures are turned into responses here.
 */
export async function handle(
  request: MaintenanceRequest,
  config: MaintenanceConfig,
  deps: DispatchDependencies,
): Promise<MaintenanceResponse> {
  // A special prefix without a downstream function disables special routing
  if (isSpecialPath(request.path, config) && config.downstreamRef !== '') {
    console.log(`Request ${request.requestId}: forwarding ${request.path} to ${config.downstreamRef}`);
    return relayDownstream(request, config, deps);
  }

  if (config.maintenanceMode) {
    console.log(`Request ${request.requestId}: maintenance mode, serving maintenance page`);
    return maintenancePage(request, config, deps);
  }

  return jsonResponse(200, NORMAL_OPERATION_BODY);
}
