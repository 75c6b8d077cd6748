/**
 * HTTP请求客户端
 * 封装axios实例，将请求失败映射为数据源不可用或响应格式错误
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { PipelineLogger, defaultLogger } from '../../utils/logger';
import { PipelineError, PipelineErrorType } from '../../utils/error-handler';

export interface RequestClientConfig {
  /** 请求超时时间（毫秒） */
  timeout: number;

  /** 用户代理 */
  userAgent: string;
}

export interface JsonRequest {
  url: string;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** 数据源标识，用于错误上下文 */
  source: string;
}

/** 原始响应 */
export interface TextResponse {
  status: number;
  body: string;
}

/** 底层传输函数，测试时可替换 */
export type HttpTransport = (url: string, config: AxiosRequestConfig) => Promise<TextResponse>;

export interface HttpFetcher {
  getJson(request: JsonRequest): Promise<unknown>;
}

/** 视为认证失败的状态码 */
const AUTH_STATUSES = new Set([401, 403]);

function createAxiosTransport(instance: AxiosInstance): HttpTransport {
  return async (url, config) => {
    const response = await instance.get<string>(url, config);
    return { status: response.status, body: response.data };
  };
}

export class RequestClient implements HttpFetcher {
  private config: RequestClientConfig;
  private logger: PipelineLogger;
  private transport: HttpTransport;

  constructor(config: RequestClientConfig, transport?: HttpTransport) {
    this.config = config;
    this.logger = defaultLogger.createSubLogger('http');
    this.transport = transport || createAxiosTransport(this.createInstance());
  }

  /**
   * 创建axios实例，响应体按文本返回以便自行解析
   */
  private createInstance(): AxiosInstance {
    const instance = axios.create({
      timeout: this.config.timeout,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'application/json'
      }
    });

    instance.interceptors.request.use(config => {
      this.logger.debug(`Preparing request: ${config.url}`, { params: config.params }, 'request');
      return config;
    });

    instance.interceptors.response.use(response => {
      this.logger.debug(`Request successful: ${response.config.url}`, { status: response.status }, 'request');
      return response;
    });

    return instance;
  }

  /**
   * 发起GET请求并解析JSON
   */
  async getJson(request: JsonRequest): Promise<unknown> {
    let response: TextResponse;

    try {
      response = await this.transport(request.url, {
        params: request.params,
        headers: request.headers
      });
    } catch (error) {
      throw this.toSourceUnavailable(error, request);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new PipelineError(
        `Unexpected HTTP status ${response.status} from ${request.url}`,
        PipelineErrorType.SOURCE_UNAVAILABLE,
        request.source,
        'request',
        { url: request.url, status: response.status }
      );
    }

    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new PipelineError(
        `Response from ${request.url} is not valid JSON`,
        PipelineErrorType.MALFORMED_RESPONSE,
        request.source,
        'parse',
        { url: request.url, reason: error instanceof Error ? error.message : String(error) }
      );
    }
  }

  /**
   * 将传输层错误映射为数据源不可用
   */
  private toSourceUnavailable(error: unknown, request: JsonRequest): PipelineError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const reason = status === undefined
        ? `network error (${error.code || 'unknown'})`
        : AUTH_STATUSES.has(status)
          ? `authentication failed (HTTP ${status})`
          : `HTTP ${status}`;

      return new PipelineError(
        `Request to ${request.url} failed: ${reason}`,
        PipelineErrorType.SOURCE_UNAVAILABLE,
        request.source,
        'request',
        { url: request.url, status, code: error.code }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new PipelineError(
      `Request to ${request.url} failed: ${message}`,
      PipelineErrorType.SOURCE_UNAVAILABLE,
      request.source,
      'request',
      { url: request.url }
    );
  }
}
