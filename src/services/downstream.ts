import { InvokeCommand } from '@aws-sdk/client-lambda';
import { describeError, DownstreamUnavailableError } from './errors';

export interface DownstreamInvoker {
  invoke(functionRef: string, payload: unknown): Promise<unknown>;
}

// The part of LambdaClient this module depends on
export interface FunctionInvoker {
  send(
    command: InvokeCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<{ Payload?: Uint8Array; FunctionError?: string }>;
}

export class LambdaDownstreamInvoker implements DownstreamInvoker {
  constructor(
    private readonly client: FunctionInvoker,
    private readonly timeoutMs: number,
  ) {}

  async invoke(functionRef: string, payload: unknown): Promise<unknown> {
    const signal = AbortSignal.timeout(this.timeoutMs);

    let response: { Payload?: Uint8Array; FunctionError?: string };
    try {
      response = await this.client.send(
        new InvokeCommand({
          FunctionName: functionRef,
          InvocationType: 'RequestResponse',
          Payload: new TextEncoder().encode(JSON.stringify(payload)),
        }),
        { abortSignal: signal },
      );
    } catch (error) {
      const reason = signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(error);
      throw new DownstreamUnavailableError(functionRef, reason, { cause: error });
    }

    // An unhandled exception in the downstream function still comes back as a
    // 200 invoke; the error object sits in the payload.
    if (response.FunctionError) {
      throw new DownstreamUnavailableError(
        functionRef,
        `function error: ${response.FunctionError}`,
      );
    }

    if (!response.Payload || response.Payload.length === 0) {
      throw new DownstreamUnavailableError(functionRef, 'empty payload');
    }

    const text = new TextDecoder().decode(response.Payload);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new DownstreamUnavailableError(functionRef, 'payload is not valid JSON', {
        cause: error,
      });
    }
  }
}
