import type { Context } from 'aws-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { loadConfig } from '../config';
import { toMaintenanceRequest } from '../models';
import type { InboundEvent, MaintenanceConfig, MaintenanceResponse } from '../models';
import { LambdaDownstreamInvoker } from '../services/downstream';
import { S3MaintenancePageStore } from '../services/storage';
import { handle, statusDescription } from './dispatch';
import type { DispatchDependencies } from './dispatch';

export type MaintenanceHandler = (
  event: InboundEvent,
  context: Context,
) => Promise<MaintenanceResponse>;

export function createHandler(
  config: MaintenanceConfig,
  deps: DispatchDependencies,
): MaintenanceHandler {
  return async (event, context) => {
    try {
      const request = toMaintenanceRequest(event, context);
      return await handle(request, config, deps);
    } catch (error) {
      console.error('Unexpected error handling request:', error);

      return {
        statusCode: 500,
        statusDescription: statusDescription(500),
        isBase64Encoded: false,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ error: 'Internal server error' }),
      };
    }
  };
}

// Resolved once per execution environment
const config = loadConfig(process.env);

// Initialize clients
const s3Client = new S3Client({});
const lambdaClient = new LambdaClient({});

export const handler = createHandler(config, {
  pageStore: new S3MaintenancePageStore(s3Client, config.storageTimeoutMs),
  downstream: new LambdaDownstreamInvoker(lambdaClient, config.downstreamTimeoutMs),
  now: () => new Date(),
});
