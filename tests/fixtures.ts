import type { Context } from 'aws-lambda';
import type { InboundEvent, MaintenanceConfig } from '../src/models';

export const SPECIAL_FUNCTION_ARN = 'arn:aws:lambda:us-east-1:123456789012:function:special-function';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export function makeConfig(overrides: Partial<MaintenanceConfig> = {}): MaintenanceConfig {
  return {
    maintenanceMode: true,
    storage: { bucket: 'test-bucket', key: 'test-key.html' },
    specialPrefix: '/special',
    downstreamRef: SPECIAL_FUNCTION_ARN,
    retryAfter: '3600',
    storageTimeoutMs: 3000,
    downstreamTimeoutMs: 10000,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    path: '/test',
    httpMethod: 'GET',
    headers: {
      host: 'example.com',
      'user-agent': 'Test-Agent/1.0',
    },
    queryStringParameters: { param1: 'value1' },
    requestContext: {
      identity: { sourceIp: '192.168.1.1' },
    },
    ...overrides,
  };
}

export function makeContext(overrides: Partial<Context> = {}): Context {
  return {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'test-function',
    functionVersion: '1',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:test-function',
    memoryLimitInMB: '128',
    awsRequestId: 'test-request-id-123',
    logGroupName: '/aws/lambda/test-function',
    logStreamName: '2024/05/01/[$LATEST]0123456789abcdef',
    getRemainingTimeInMillis: () => 30000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
    ...overrides,
  };
}
