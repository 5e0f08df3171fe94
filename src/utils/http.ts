import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import https from 'https';
import { createLogger } from '../core/Logger';
import type { HttpClientConfig } from '../types/http.types';

const logger = createLogger('HTTP');

/**
 * Create an HTTP client for a router's web console.
 *
 * Responses are always delivered as raw text and never rejected on status,
 * so callers decide what a 401 or a 500 means for them. Retries are left to
 * the caller as well.
 */
export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? 30000,
    headers: config.headers ?? {},
    auth: config.auth,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
  };

  // Handle SSL verification
  if (config.verifySsl === false) {
    axiosConfig.httpsAgent = new https.Agent({
      rejectUnauthorized: false,
    });
  }

  const client = axios.create(axiosConfig);

  addLoggingInterceptor(client);

  return client;
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${config.baseURL}${config.url}`);
      return config;
    },
    (error: Error) => {
      logger.error(`Request error: ${error.message}`);
      return Promise.reject(error);
    }
  );

  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: AxiosError) => {
      if (error.request) {
        logger.debug(`${error.config?.method?.toUpperCase()} ${error.config?.url} - No response`);
      }
      return Promise.reject(error);
    }
  );
}

/**
 * Format an Axios error for logging
 */
export function formatHttpError(error: unknown): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  const url = error.config?.url || 'unknown';

  if (error.response) {
    return `HTTP ${error.response.status} ${error.response.statusText} for ${url}`;
  } else if (error.request) {
    // Request made but no response received
    if (error.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (error.code === 'ENOTFOUND') {
      return `Host not found for ${url}`;
    }
    return `No response received from ${url}: ${error.code || error.message}`;
  }

  // Error setting up request
  return error.message;
}

/**
 * Check if a request was aborted through its AbortSignal
 */
export function isCancelledRequest(error: unknown): boolean {
  return axios.isCancel(error) || (axios.isAxiosError(error) && error.code === 'ERR_CANCELED');
}

/**
 * Check if a status code is a success (2xx)
 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
