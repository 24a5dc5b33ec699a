// =====================================================
// HTTP Test Helper
// =====================================================
// Axios adapter that answers from a handler instead of the
// network, and records every request it saw.

import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  authorization: string | null;
  timeout: number | undefined;
}

export type MockReply =
  | { status: number; data?: unknown; headers?: Record<string, string> }
  | { networkError: string };

export type MockHandler = (request: RecordedRequest, callIndex: number) => MockReply;

export interface MockTransport {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

function toRecordedRequest(config: InternalAxiosRequestConfig): RecordedRequest {
  const authorization = config.headers.get('Authorization');
  const params: unknown = config.params;

  return {
    method: (config.method ?? 'get').toUpperCase(),
    url: config.url ?? '',
    params: typeof params === 'object' && params !== null ? { ...params } : {},
    authorization: typeof authorization === 'string' ? authorization : null,
    timeout: config.timeout,
  };
}

export function createMockTransport(handler: MockHandler): MockTransport {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const request = toRecordedRequest(config);
    requests.push(request);

    const reply = handler(request, requests.length - 1);

    if ('networkError' in reply) {
      throw new AxiosError(`connect ${reply.networkError}`, reply.networkError, config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: '',
      headers: new AxiosHeaders(reply.headers ?? {}),
      config,
      request: {},
    };

    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}

/**
 * Handler that replays `replies` in order, repeating the last one.
 */
export function sequence(...replies: MockReply[]): MockHandler {
  return (_request, callIndex) => replies[Math.min(callIndex, replies.length - 1)] ?? { status: 500 };
}
