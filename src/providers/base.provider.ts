// src/providers/base.provider.ts

import { Logger } from '@nestjs/common';
import { AxiosInstance, isAxiosError } from 'axios';
import { HttpClientFactory, QueryParams } from '../common/utils/http-client.factory';
import { extractErrorMessage } from '../common/utils/error-message.util';

/**
 * Base class for HTTP lookup providers
 *
 * Shares:
 * - HTTP client creation
 * - error description and logging
 */
export abstract class BaseProvider {
  protected readonly logger: Logger;
  protected httpClient: AxiosInstance;

  constructor(
    providerName: string,
    httpConfig: {
      baseURL?: string;
      timeout?: number;
      headers?: Record<string, string>;
      params?: QueryParams;
    }
  ) {
    this.logger = new Logger(providerName);
    this.httpClient = HttpClientFactory.create(httpConfig);
  }

  /**
   * Run a request and fall back to a default value on any failure
   */
  protected async safeRequest<T>(
    requestFn: () => Promise<T>,
    errorContext: string,
    defaultValue: T
  ): Promise<T> {
    try {
      return await requestFn();
    } catch (error) {
      this.logger.error(`${errorContext}: ${this.describeError(error)}`);
      return defaultValue;
    }
  }

  /**
   * Human readable description of an HTTP failure, including the status code
   */
  protected describeError(error: unknown): string {
    if (isAxiosError(error) && error.response) {
      return `${error.message} (HTTP ${error.response.status})`;
    }
    return extractErrorMessage(error);
  }
}
