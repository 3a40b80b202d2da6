import axios, { AxiosError, AxiosInstance } from 'axios';
import logger from './logger';

declare module 'axios' {
  export interface AxiosRequestConfig {
    retry?: boolean;
    __retryCount?: number;
  }
}

const DEFAULT_TIMEOUT_MS = Math.max(1000, parseInt(process.env.HTTP_CLIENT_TIMEOUT_MS || '10000', 10));
const MAX_RETRIES = Math.max(0, parseInt(process.env.HTTP_CLIENT_MAX_RETRIES || '2', 10));
const BASE_RETRY_DELAY_MS = Math.max(10, parseInt(process.env.HTTP_CLIENT_RETRY_DELAY_MS || '300', 10));

const TRANSIENT_CODES = new Set(['ECONNABORTED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

export function isTransientError(error: AxiosError): boolean {
  if (error.code && TRANSIENT_CODES.has(error.code)) {
    return true;
  }

  const status = error.response?.status;
  return status !== undefined && status >= 500;
}

const httpClient: AxiosInstance = axios.create({
  timeout: DEFAULT_TIMEOUT_MS,
  maxRedirects: 5,
  validateStatus: (status) => status >= 200 && status < 300,
  headers: {
    Accept: 'application/json',
  },
});

httpClient.interceptors.response.use(
  (response) => response,
  async (error: AxiosError) => {
    const requestConfig = error.config;
    if (!requestConfig || requestConfig.retry === false || !isTransientError(error)) {
      return Promise.reject(error);
    }

    requestConfig.__retryCount = (requestConfig.__retryCount || 0) + 1;
    if (requestConfig.__retryCount > MAX_RETRIES) {
      return Promise.reject(error);
    }

    const delay = BASE_RETRY_DELAY_MS * requestConfig.__retryCount;
    logger.warn('Retrying HTTP request after transient error', {
      url: requestConfig.url,
      attempt: requestConfig.__retryCount,
      delayMs: delay,
      code: error.code,
      status: error.response?.status,
    });

    await new Promise<void>((resolve) => {
      setTimeout(resolve, delay);
    });
    return httpClient(requestConfig);
  },
);

export default httpClient;
