import { AxiosWebClient, type AxiosWebClientOptions } from './axios-client';
import { UndiciWebClient } from './undici-client';
import type { WebClient } from './types';

export type WebClientKind = 'axios' | 'undici';

export interface CreateWebClientOptions extends AxiosWebClientOptions {
  client?: WebClientKind;
}

export function createWebClient(options: CreateWebClientOptions = {}): WebClient {
  const { client = 'axios', ...clientOptions } = options;
  return client === 'undici' ? new UndiciWebClient(clientOptions) : new AxiosWebClient(clientOptions);
}

export { AxiosWebClient, UndiciWebClient };
export { BaseWebClient, BufferedSuccessResponse } from './base-client';
export { getUrlRetryOnClientErrors } from './retry';
export * from './types';
