import type { ALBEvent, ALBEventRequestContext, Context } from 'aws-lambda';

// ALB event as it may reach the handler, with every field optional
export type InboundEvent = Partial<Omit<ALBEvent, 'requestContext'>> & {
  requestContext?: Partial<ALBEventRequestContext> & {
    identity?: { sourceIp?: string };
  };
};

// Request descriptor built once per invocation
export interface MaintenanceRequest {
  path: string;
  method: string;
  headers: Record<string, string>; // keys are lower-cased
  sourceIp: string;
  requestId: string;
  functionName: string;
  functionVersion: string;
  memoryLimitInMB: string;
  event: InboundEvent;
}

export type InvocationContext = Pick<
  Context,
  'awsRequestId' | 'functionName' | 'functionVersion' | 'memoryLimitInMB'
>;

/**
 * Flattens single and multi-value ALB headers into one lower-cased map.
 * Single-value headers win over the first entry of a multi-value header.
 */
export function normalizeHeaders(event: InboundEvent): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [name, values] of Object.entries(event.multiValueHeaders ?? {})) {
    const first = values?.[0];
    if (first !== undefined) {
      headers[name.toLowerCase()] = first;
    }
  }

  for (const [name, value] of Object.entries(event.headers ?? {})) {
    if (value !== undefined) {
      headers[name.toLowerCase()] = value;
    }
  }

  return headers;
}

export function toMaintenanceRequest(
  event: InboundEvent | null | undefined,
  context: Partial<InvocationContext> | null | undefined,
): MaintenanceRequest {
  const safeEvent: InboundEvent = event ?? {};
  const headers = normalizeHeaders(safeEvent);

  // ALB does not populate requestContext.identity; the client address arrives
  // as the first hop of X-Forwarded-For instead.
  const forwardedFor = (headers['x-forwarded-for'] ?? '').split(',')[0].trim();

  return {
    path: safeEvent.path ?? '',
    method: safeEvent.httpMethod ?? '',
    headers,
    sourceIp: safeEvent.requestContext?.identity?.sourceIp ?? forwardedFor,
    requestId: context?.awsRequestId ?? '',
    functionName: context?.functionName ?? '',
    functionVersion: context?.functionVersion ?? '',
    memoryLimitInMB: context?.memoryLimitInMB ?? '',
    event: safeEvent,
  };
}
