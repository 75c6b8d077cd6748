/**
 * 加密货币价格数据源（CoinGecko）
 */

import { BaseSource, FetchResult } from './base-source';
import { HttpFetcher } from '../http/request-client';
import { SourceId } from '../types/raw-record';
import { CryptoSourceConfig } from '../../system/config';
import { isRecord } from '../../utils/type-guards';

export class CryptoSource extends BaseSource {
  private sourceConfig: CryptoSourceConfig;

  constructor(sourceConfig: CryptoSourceConfig, fetcher: HttpFetcher) {
    super({ source: SourceId.CRYPTO, name: 'CoinGecko API' }, fetcher);
    this.sourceConfig = sourceConfig;
  }

  protected async executeFetch(): Promise<FetchResult> {
    const headers: Record<string, string> = {};
    if (this.sourceConfig.apiKey) {
      headers['x-cg-demo-api-key'] = this.sourceConfig.apiKey;
    }

    const payload = await this.fetcher.getJson({
      url: this.sourceConfig.endpoint,
      params: {
        ids: this.sourceConfig.coins.join(','),
        vs_currencies: this.sourceConfig.vsCurrency,
        include_24hr_change: 'true',
        include_market_cap: 'true'
      },
      headers,
      source: this.source
    });

    if (!isRecord(payload) || !Object.values(payload).every(isRecord)) {
      throw this.malformed('CoinGecko price response is not a map of coin quotes', { endpoint: this.sourceConfig.endpoint });
    }

    return {
      endpoint: this.sourceConfig.endpoint,
      payload,
      itemCount: Object.keys(payload).length
    };
  }
}
