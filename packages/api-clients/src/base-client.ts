/**
 * Base API Client
 * ===============
 * Shared axios setup for the remote providers: base URL, timeout, default
 * headers, typed error mapping and per-call debug logging. Calls are made
 * exactly once; retry policy belongs to the caller.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { createLogger, ApiError, TimeoutError } from '@ontocache/utils';

const logger = createLogger('@ontocache/api-clients');

/**
 * Base API client configuration
 */
export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  apiName?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

export class BaseApiClient {
  protected axiosInstance: AxiosInstance;
  protected apiName: string;
  private readonly startTimes = new WeakMap<object, number>();

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';

    // Use injected axios instance or create a new one
    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: config.timeout || 30000,
        headers: {
          'Content-Type': 'application/json',
          ...config.headers,
        },
      });

    if (config.axiosInstance && !config.axiosInstance.defaults.baseURL) {
      config.axiosInstance.defaults.baseURL = config.baseURL;
    }

    // Track start time for latency logging
    this.axiosInstance.interceptors.request.use(
      (requestConfig) => {
        this.startTimes.set(requestConfig, Date.now());
        return requestConfig;
      },
      (error: unknown) => Promise.reject(error)
    );

    this.axiosInstance.interceptors.response.use(
      (response) => {
        logger.debug('API call succeeded', {
          apiName: this.apiName,
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          latencyMs: this.latencyOf(response.config),
        });
        return response;
      },
      (error: unknown) => {
        throw this.toApiError(error);
      }
    );
  }

  /**
   * Map axios failures onto the shared error classes
   */
  private toApiError(error: unknown): unknown {
    if (!axios.isAxiosError(error)) {
      return error;
    }

    const url = error.config?.url;
    const method = error.config?.method?.toUpperCase();
    const latencyMs = this.latencyOf(error.config);

    // Handle timeout
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message.includes('timeout')) {
      logger.debug('API call timed out', { apiName: this.apiName, method, url, latencyMs });
      return new TimeoutError(`Request to ${this.apiName} timed out`, this.axiosInstance.defaults.timeout, {
        apiName: this.apiName,
        url,
      });
    }

    // Handle API errors
    if (error.response) {
      logger.debug('API call failed', {
        apiName: this.apiName,
        method,
        url,
        status: error.response.status,
        latencyMs,
      });
      return new ApiError(
        error.response.statusText || error.message,
        this.apiName,
        error.response.status,
        error.response.data,
        { url, method }
      );
    }

    // Handle network errors
    if (error.request) {
      logger.debug('API call could not reach the server', {
        apiName: this.apiName,
        method,
        url,
        error: error.message,
        latencyMs,
      });
      return new ApiError(`Network error: ${error.message}`, this.apiName, undefined, undefined, { url });
    }

    return error;
  }

  private latencyOf(requestConfig: object | undefined): number {
    const startTime = requestConfig ? this.startTimes.get(requestConfig) : undefined;
    return startTime ? Date.now() - startTime : 0;
  }

  protected async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.axiosInstance.request<T>(config);
  }

  /**
   * GET request, parsed as JSON where the body allows it
   */
  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'GET', url });
    return response.data;
  }

  /**
   * GET request returning the raw body text
   */
  async getText(url: string, config?: AxiosRequestConfig): Promise<string> {
    const response = await this.request<unknown>({ ...config, method: 'GET', url, responseType: 'text' });
    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
  }

  /**
   * Get axios instance for advanced usage
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }
}
