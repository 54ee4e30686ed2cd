/**
 * Fixture loading and an in-process axios adapter for provider tests.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export const FIXTURE_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '__fixtures__');

export function loadFixture(name: string): unknown {
  const body: unknown = JSON.parse(readFileSync(join(FIXTURE_DIR, name), 'utf-8'));
  return body;
}

export interface StubReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

/**
 * axios instance whose adapter answers every request with `handler` and
 * rejects non-2xx replies the way the built-in adapters do.
 */
export function stubHttp(handler: (config: InternalAxiosRequestConfig) => StubReply): {
  httpClient: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];

  const httpClient = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const { status, data, headers = {} } = handler(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers, config };

      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });

  return { httpClient, requests };
}
