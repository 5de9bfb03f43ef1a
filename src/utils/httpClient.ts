import axios, { AxiosInstance } from 'axios';
import { CheerioCrawler, Configuration, ProxyConfiguration } from 'crawlee';
import { log } from './logger';

export const createHttpClient = (proxy?: string, timeoutMs = 20000): AxiosInstance => {
  const instance = axios.create({ timeout: timeoutMs, headers: { 'accept-language': 'es-ES,es;q=0.9,en;q=0.8' } });
  if (proxy) {
    const p = new URL(proxy);
    instance.defaults.proxy = {
      protocol: p.protocol.replace(':', ''),
      host: p.hostname,
      port: Number(p.port || 80),
    };
  }
  return instance;
};

export interface PageRequest {
  url: string;
  headers?: Record<string, string>;
}

export interface PageFetchOptions {
  timeoutMs?: number;
  proxy?: string;
}

export type PageFetcher = (page: PageRequest, options?: PageFetchOptions) => Promise<string>;

// One throwaway crawler per page, with in-memory storage, so that concurrent
// sessions never share a request queue on disk.
export const fetchPageHtml: PageFetcher = async (page, { timeoutMs = 20000, proxy } = {}) => {
  const proxyConfiguration = proxy ? new ProxyConfiguration({ proxyUrls: [proxy] }) : undefined;
  const timeoutSecs = Math.max(1, Math.ceil(timeoutMs / 1000));
  let html: string | undefined;
  let failure: Error | undefined;

  const crawler = new CheerioCrawler(
    {
      maxConcurrency: 1,
      maxRequestRetries: 1,
      navigationTimeoutSecs: timeoutSecs,
      requestHandlerTimeoutSecs: timeoutSecs,
      proxyConfiguration,
      requestHandler: async ({ body }) => {
        html = typeof body === 'string' ? body : body.toString('utf8');
      },
      failedRequestHandler: ({ request }, error) => {
        failure = error;
        log('WARN', `Page request failed ${request.url}`, error.message);
      },
    },
    new Configuration({ persistStorage: false }),
  );

  await crawler.run([{ url: page.url, uniqueKey: page.url, headers: page.headers }]);
  if (html === undefined) {
    throw failure ?? new Error(`No content fetched from ${page.url}`);
  }
  return html;
};
