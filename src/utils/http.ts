import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import { createLogger } from '../core/Logger';
import type { HttpClientConfig } from '../types/http.types';

const logger = createLogger('HTTP');

/**
 * Create an HTTP client with request logging and a bounded timeout.
 * No retry interceptor: device sessions are stateful, a replayed request is rejected.
 */
export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? 30000,
  };

  const client = axios.create(axiosConfig);

  // Add logging interceptor
  addLoggingInterceptor(client);

  return client;
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  // Request logging
  client.interceptors.request.use(
    (config) => {
      logger.debug(`${config.method?.toUpperCase()} ${config.baseURL}${config.url}`);
      return config;
    },
    (error) => {
      logger.error(`Request error: ${error.message}`);
      return Promise.reject(error);
    }
  );

  // Response logging
  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: AxiosError) => {
      if (error.response) {
        logger.debug(
          `${error.config?.method?.toUpperCase()} ${error.config?.url} - ${error.response.status}`
        );
      } else if (error.request) {
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
    // Server responded with error status
    return `HTTP ${error.response.status} ${error.response.statusText} for ${url}`;
  } else if (error.request) {
    // Request made but no response received
    if (error.code === 'ECONNREFUSED') {
      return `Connection refused to ${url}`;
    } else if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      return `Request timed out for ${url}`;
    } else if (error.code === 'EHOSTUNREACH') {
      return `Host unreachable for ${url}`;
    }
    return `No response received from ${url}: ${error.code || error.message}`;
  }

  // Error setting up request
  return error.message;
}

/**
 * Check if an error is a network error (no response)
 */
export function isNetworkError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  return !error.response && !!error.request;
}

/**
 * Execute a request with timeout
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out'
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new Error(message));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
