/**
 * HTTP Transport
 * ==============
 * The only place that talks HTTP. Everything above it sees
 * request(method, url, headers, body) -> (status, body).
 *
 * Statuses are never turned into errors here: the caller decides which
 * status an operation expects. Only failures that produce no HTTP response
 * become TransportErrors.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { createLogger, TransportError } from '@predictkit/utils';

const log = createLogger('client:transport');

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface MultipartFile {
  fieldName: string;
  fileName: string;
  contentType: string;
  content: string;
}

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; fields: Record<string, string> }
  | { kind: 'multipart'; fields: Record<string, string>; file: MultipartFile };

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: RequestBody;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
}

export interface AxiosTransportConfig {
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

function toRequestData(body: RequestBody | undefined): unknown {
  if (!body) {
    return undefined;
  }
  switch (body.kind) {
    case 'json':
      return body.value;
    case 'form':
      return new URLSearchParams(body.fields);
    case 'multipart': {
      const form = new FormData();
      for (const [name, value] of Object.entries(body.fields)) {
        form.append(name, value);
      }
      const { fieldName, fileName, contentType, content } = body.file;
      form.append(fieldName, new Blob([content], { type: contentType }), fileName);
      return form;
    }
  }
}

function toText(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

/**
 * Transport backed by axios
 */
export class AxiosTransport implements Transport {
  protected axiosInstance: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(config: AxiosTransportConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30_000;

    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        timeout: this.timeoutMs,
        headers: { ...config.headers },
      });

    this.axiosInstance.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (axios.isAxiosError(error) && !error.response) {
          const url = error.config?.url;
          const method = error.config?.method?.toUpperCase();
          log.error('Request produced no response', error, { uri: url, method });
          if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return Promise.reject(
              new TransportError(`Request to ${url} timed out after ${this.timeoutMs}ms`, {
                url,
                method,
                timeoutMs: this.timeoutMs,
              })
            );
          }
          return Promise.reject(
            new TransportError(`Network error: ${error.message}`, { url, method, code: error.code })
          );
        }
        return Promise.reject(error);
      }
    );
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const startTime = Date.now();
    const config: AxiosRequestConfig = {
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: toRequestData(request.body),
      responseType: 'text',
      // keep the body as text; callers parse what they expect
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    };

    const response = await this.axiosInstance.request<unknown>(config);

    log.debug('HTTP request completed', {
      method: request.method,
      uri: request.url,
      status: response.status,
      latencyMs: Date.now() - startTime,
    });

    return { status: response.status, body: toText(response.data) };
  }

  /**
   * Get axios instance for advanced usage
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }
}
