/**
 * Canned axios adapters so HTTP clients can be exercised without a network
 */

import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";

export function response<T>(config: InternalAxiosRequestConfig, data: T, status = 200): AxiosResponse<T> {
  return { data, status, statusText: status === 200 ? "OK" : "Error", headers: {}, config };
}

/** Custom adapters bypass validateStatus, so errors are raised the way axios raises them. */
export function httpError(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    config,
    null,
    response(config, data, status)
  );
}

export class StubAdapter {
  readonly requests: InternalAxiosRequestConfig[] = [];

  constructor(private readonly handler: (config: InternalAxiosRequestConfig) => AxiosResponse | Promise<AxiosResponse>) {}

  readonly adapter: AxiosAdapter = async (config) => {
    this.requests.push(config);
    return this.handler(config);
  };
}
