import { BaseSource } from './base-source';
import { GithubTrendingSource } from './github-trending-source';
import { WeatherSource } from './weather-source';
import { CryptoSource } from './crypto-source';
import { HttpFetcher } from '../http/request-client';
import { SourceId } from '../types/raw-record';
import { PipelineConfig } from '../../system/config';

export { BaseSource, GithubTrendingSource, WeatherSource, CryptoSource };

/**
 * 按配置创建启用的数据源，顺序与配置一致
 */
export function createSources(config: PipelineConfig, fetcher: HttpFetcher): BaseSource[] {
  return config.enabledSources.map(source => {
    switch (source) {
      case SourceId.GITHUB_TRENDING:
        return new GithubTrendingSource(config.sources.githubTrending, fetcher);
      case SourceId.WEATHER:
        return new WeatherSource(config.sources.weather, fetcher);
      case SourceId.CRYPTO:
        return new CryptoSource(config.sources.crypto, fetcher);
    }
  });
}
