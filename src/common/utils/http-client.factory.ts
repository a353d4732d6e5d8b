// src/common/utils/http-client.factory.ts

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP client factory
 *
 * Builds the axios instances used by the lookup providers so timeouts and
 * headers stay consistent.
 */
export class HttpClientFactory {
  /**
   * Create a plain JSON HTTP client
   */
  static create(config: {
    baseURL?: string;
    timeout?: number;
    headers?: Record<string, string>;
    params?: QueryParams;
  }): AxiosInstance {
    const axiosConfig: AxiosRequestConfig = {
      timeout: config.timeout ?? 15000,
      headers: {
        'Accept': 'application/json',
        ...config.headers,
      },
    };

    if (config.baseURL) {
      axiosConfig.baseURL = config.baseURL;
    }

    if (config.params) {
      axiosConfig.params = config.params;
    }

    return axios.create(axiosConfig);
  }

  /**
   * Create a client that sends an API key as a query parameter
   * (OpenWeather uses `appid`, Google Maps uses `key`)
   */
  static createWithApiKey(
    apiKey: string | undefined,
    config: {
      baseURL?: string;
      timeout?: number;
      paramName?: string;
      additionalParams?: QueryParams;
    }
  ): AxiosInstance {
    const paramName = config.paramName || 'appid';
    const params: QueryParams = {
      [paramName]: apiKey || '',
      ...config.additionalParams,
    };

    return this.create({
      baseURL: config.baseURL,
      timeout: config.timeout,
      params,
    });
  }
}
