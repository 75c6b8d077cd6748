/**
 * 天气数据源（wttr.in）
 * 逐个城市请求，单个城市失败时跳过，全部失败时数据源失败
 */

import { BaseSource, FetchResult } from './base-source';
import { HttpFetcher } from '../http/request-client';
import { SourceId } from '../types/raw-record';
import { WeatherSourceConfig } from '../../system/config';
import { PipelineError, PipelineErrorType, PipelineErrorHandler, isPipelineError, toError } from '../../utils/error-handler';
import { isRecord, isRecordArray } from '../../utils/type-guards';

/** 单个城市的原始响应 */
export interface CityObservation {
  city: string;
  response: unknown;
}

export interface WeatherPayload {
  observations: CityObservation[];
  failedCities: string[];
}

export class WeatherSource extends BaseSource {
  private sourceConfig: WeatherSourceConfig;
  private errorHandler: PipelineErrorHandler;

  constructor(sourceConfig: WeatherSourceConfig, fetcher: HttpFetcher) {
    super({ source: SourceId.WEATHER, name: 'wttr.in' }, fetcher);
    this.sourceConfig = sourceConfig;
    this.errorHandler = new PipelineErrorHandler(this.logger);
  }

  protected async executeFetch(): Promise<FetchResult> {
    const observations: CityObservation[] = [];
    const failures: PipelineError[] = [];

    for (const city of this.sourceConfig.cities) {
      try {
        observations.push({ city, response: await this.fetchCity(city) });
      } catch (error) {
        const failure = isPipelineError(error)
          ? error
          : new PipelineError(toError(error).message, PipelineErrorType.SOURCE_UNAVAILABLE, this.source, 'fetch');
        this.errorHandler.handleError(failure, { operation: `fetch:${city}` });
        failures.push(failure);
      }
    }

    if (observations.length === 0) {
      const allMalformed = failures.every(failure => failure.errorType === PipelineErrorType.MALFORMED_RESPONSE);
      throw new PipelineError(
        `No weather observation could be collected for ${this.sourceConfig.cities.length} cities`,
        allMalformed ? PipelineErrorType.MALFORMED_RESPONSE : PipelineErrorType.SOURCE_UNAVAILABLE,
        this.source,
        'fetch',
        { reasons: failures.map(failure => failure.message) }
      );
    }

    const payload: WeatherPayload = {
      observations,
      failedCities: this.sourceConfig.cities.filter(city => !observations.some(item => item.city === city))
    };

    return {
      endpoint: this.sourceConfig.endpoint,
      payload,
      itemCount: observations.length
    };
  }

  /**
   * 请求单个城市的当前天气
   */
  private async fetchCity(city: string): Promise<unknown> {
    const url = `${this.sourceConfig.endpoint.replace(/\/+$/, '')}/${encodeURIComponent(city)}`;
    const response = await this.fetcher.getJson({
      url,
      params: { format: 'j1' },
      source: this.source
    });

    if (!isRecord(response) || !isRecordArray(response.current_condition) || response.current_condition.length === 0) {
      throw this.malformed(`Weather response for ${city} has no current_condition`, { city });
    }

    return response;
  }
}
