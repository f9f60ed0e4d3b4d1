/**
 * Shared axios setup for crawler traffic: page fetches and robots.txt lookups.
 * One pair of keep-alive agents is reused by every client in the process.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import http from 'http';
import https from 'https';

export const HTTP_TIMEOUTS = {
  /** robots.txt and other small lookups */
  SHORT: 5000,
  /** page fetches when the crawl policy sets no timeout */
  STANDARD: 10000,
} as const;

const agentOptions = { keepAlive: true, keepAliveMsecs: 30000, maxSockets: 10, maxFreeSockets: 5, timeout: 60000 };
const httpAgent = new http.Agent(agentOptions);
const httpsAgent = new https.Agent(agentOptions);

/**
 * Minimal GET surface the crawler depends on, so tests can pass a fake client
 */
export interface HttpGetClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ status: number; data: unknown }>;
}

/**
 * Axios instance on the shared agents. Every status resolves; the fetch
 * strategies classify 4xx/5xx themselves.
 */
export function createHttpClient(config: AxiosRequestConfig = {}): AxiosInstance {
  return axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    maxRedirects: 5,
    responseType: 'text',
    validateStatus: () => true,
    ...config,
  });
}
