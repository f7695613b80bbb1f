import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { retry, type RetryOptions } from '../../utils/retry.js';
import { logger, errorMessage, type Logger } from '../../utils/logger.js';
import { recordApiRequest, observeApiLatency, apiErrors } from '../../utils/metrics.js';

/**
 * Retry client configuration
 */
export interface RetryClientConfig {
  /**
   * Retry options for API calls
   */
  retryOptions?: Partial<RetryOptions>;
  /**
   * Exchange or service name for metrics
   */
  service: string;
  /**
   * Base URL for the API
   */
  baseURL?: string;
  /**
   * Default timeout in milliseconds
   */
  timeout?: number;
  /**
   * Additional axios configuration
   */
  axiosConfig?: AxiosRequestConfig;
}

/**
 * A request, or a factory re-run on every attempt (for signatures that embed a timestamp)
 */
export type RequestSource = AxiosRequestConfig | (() => AxiosRequestConfig);

/**
 * Axios instance with retry logic and metrics
 */
export class RetryClient {
  private axiosInstance: AxiosInstance;
  private log: Logger;
  private service: string;
  private retryOptions: Partial<RetryOptions>;

  constructor(config: RetryClientConfig) {
    this.service = config.service;
    this.retryOptions = config.retryOptions ?? {};
    this.log = logger(`RetryClient:${config.service}`);

    const axiosConfig: AxiosRequestConfig = {
      timeout: config.timeout ?? 30000,
      ...config.axiosConfig,
    };
    if (config.baseURL) {
      axiosConfig.baseURL = config.baseURL;
    }
    this.axiosInstance = axios.create(axiosConfig);

    // Add request interceptor for logging
    this.axiosInstance.interceptors.request.use((requestConfig) => {
      this.log.debug('API request', {
        method: requestConfig.method,
        url: requestConfig.url ?? 'unknown',
      });
      return requestConfig;
    });
  }

  /**
   * Get error type from an axios error
   */
  private getErrorType(error: unknown): string {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        return `http_${error.response.status}`;
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return 'timeout';
      }
      return 'network_error';
    }
    return 'unknown_error';
  }

  /**
   * Network failures, 5xx, 429 and 408 are retried; other 4xx are not
   */
  static isRetryableError(error: unknown): boolean {
    if (axios.isAxiosError(error)) {
      // Retry on network errors
      if (!error.response) {
        return true;
      }

      const status = error.response.status;
      if (status >= 500 && status < 600) {
        return true;
      }
      return status === 429 || status === 408;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      return (
        message.includes('network') ||
        message.includes('timeout') ||
        message.includes('econnrefused') ||
        message.includes('econnreset') ||
        message.includes('etimedout') ||
        message.includes('socket hang up')
      );
    }

    return false;
  }

  /**
   * Make a GET request with retry
   */
  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.request<T>({ ...config, method: 'GET', url });
  }

  /**
   * Make a POST request with retry
   */
  async post<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<AxiosResponse<T>> {
    return this.request<T>({ ...config, method: 'POST', url, data });
  }

  /**
   * Make a request with retry logic
   */
  async request<T = unknown>(source: RequestSource): Promise<AxiosResponse<T>> {
    const resolve = (): AxiosRequestConfig => (typeof source === 'function' ? source() : source);
    const endpoint = resolve().url ?? 'unknown';

    try {
      return await retry(
        async () => {
          const startTime = Date.now();
          try {
            const response = await this.axiosInstance.request<T>(resolve());
            observeApiLatency(this.service, endpoint, Date.now() - startTime);
            recordApiRequest(this.service, endpoint, 'success');
            return response;
          } catch (error) {
            observeApiLatency(this.service, endpoint, Date.now() - startTime);
            recordApiRequest(this.service, endpoint, 'error');
            apiErrors.labels(this.service, this.getErrorType(error)).inc();
            throw error;
          }
        },
        {
          ...this.retryOptions,
          retryOn: (error) => {
            // Use custom retry logic if provided
            if (this.retryOptions.retryOn) {
              return this.retryOptions.retryOn(error);
            }
            return RetryClient.isRetryableError(error);
          },
          onRetry: (attempt, error, delayMs) => {
            this.log.warn(`Retrying request (attempt ${attempt})`, {
              endpoint,
              delayMs,
              error: errorMessage(error),
            });
            if (this.retryOptions.onRetry) {
              this.retryOptions.onRetry(attempt, error, delayMs);
            }
          },
        }
      );
    } catch (error) {
      this.log.error('Request failed after retries', {
        endpoint,
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
