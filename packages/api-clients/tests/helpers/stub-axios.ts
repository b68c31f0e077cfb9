/**
 * In-process axios instance for provider tests: requests are answered by a
 * handler function instead of the network.
 */

import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';

export interface StubReply {
  status: number;
  data: unknown;
  statusText?: string;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

export interface StubAxios {
  instance: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
}

export function createStubAxios(handler: StubHandler, timeout: number = 1000): StubAxios {
  const requests: InternalAxiosRequestConfig[] = [];

  const instance = axios.create({
    timeout,
    adapter: async (config) => {
      requests.push(config);
      const reply = await handler(config);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: reply.statusText ?? '',
        headers: {},
        config,
      };

      if (reply.status >= 200 && reply.status < 300) {
        return response;
      }
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response
      );
    },
  });

  return { instance, requests };
}

/**
 * Handler that fails before any response arrives (refused connection, timeout).
 */
export function failWith(message: string, code: string): StubHandler {
  return (config) => {
    throw new AxiosError(message, code, config, {});
  };
}
