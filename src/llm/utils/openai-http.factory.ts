// src/llm/utils/openai-http.factory.ts
import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { Logger } from '@nestjs/common';

/**
 * Proxy URL from the usual environment variables, if any
 */
export function resolveProxyUrl(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.HTTPS_PROXY || env.https_proxy || env.ALL_PROXY || env.all_proxy || undefined;
}

/**
 * Normalize an OpenAI-compatible base URL: upgrade http to https, drop the
 * trailing slash, reject anything that is not https.
 */
export function normalizeOpenAIBaseUrl(baseURL: string, logger?: Logger): string {
  let processed = baseURL.trim();

  if (processed.startsWith('http://')) {
    logger?.warn(`OPENAI_BASE_URL uses HTTP, converting to HTTPS: ${processed}`);
    processed = processed.replace('http://', 'https://');
  }

  if (!processed.startsWith('https://')) {
    throw new Error(`OPENAI_BASE_URL must start with https://, got: ${processed}`);
  }

  return processed.replace(/\/+$/, '');
}

/**
 * Shared agent for LLM endpoints: the configured proxy, or a keep-alive
 * IPv4 agent
 */
export function createLlmHttpsAgent(proxyUrl: string | undefined): https.Agent | HttpsProxyAgent<string> {
  return proxyUrl
    ? new HttpsProxyAgent<string>(proxyUrl)
    : new https.Agent({
        keepAlive: true,
        keepAliveMsecs: 1000,
        maxSockets: 50,
        maxFreeSockets: 10,
        timeout: 60000,
        family: 4,
      });
}

/**
 * Axios client for OpenAI chat completions
 *
 * Every OpenAI call goes through this factory so proxy, keep-alive and
 * timeout settings stay the same.
 */
export function createOpenAIHttp(
  baseURL: string = 'https://api.openai.com/v1',
  logger?: Logger
): AxiosInstance {
  const proxyUrl = resolveProxyUrl();
  if (proxyUrl) {
    logger?.debug(`Using proxy: ${proxyUrl}`);
  }

  return axios.create({
    baseURL: normalizeOpenAIBaseUrl(baseURL, logger),
    timeout: 60000,
    // axios must not apply its own proxy handling on top of the agent
    proxy: false,
    httpsAgent: createLlmHttpsAgent(proxyUrl),
    headers: { 'Content-Type': 'application/json' },
  });
}
