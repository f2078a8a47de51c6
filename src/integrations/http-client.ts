import axios, { AxiosInstance } from 'axios';

/** Network error codes that indicate the remote service could not be reached */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/**
 * True for 5xx responses, timeouts and network-level failures.
 * 4xx responses are permanent.
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;
  if (error.message.includes('timeout')) return true;

  const status = error.response?.status;
  return status !== undefined && status >= 500;
}

/**
 * Bearer-authenticated JSON client for an outbound provider.
 */
export function createProviderClient(baseURL: string, apiKey: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
  });
}
