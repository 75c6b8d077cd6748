/**
 * GitHub热门仓库数据源
 * 通过搜索接口按星标数降序获取仓库列表
 */

import { BaseSource, FetchResult } from './base-source';
import { HttpFetcher } from '../http/request-client';
import { SourceId } from '../types/raw-record';
import { GithubTrendingSourceConfig } from '../../system/config';
import { isRecord } from '../../utils/type-guards';

export class GithubTrendingSource extends BaseSource {
  private sourceConfig: GithubTrendingSourceConfig;

  constructor(sourceConfig: GithubTrendingSourceConfig, fetcher: HttpFetcher) {
    super({ source: SourceId.GITHUB_TRENDING, name: 'GitHub API' }, fetcher);
    this.sourceConfig = sourceConfig;
  }

  protected async executeFetch(): Promise<FetchResult> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json'
    };
    if (this.sourceConfig.token) {
      headers.Authorization = `Bearer ${this.sourceConfig.token}`;
    }

    const payload = await this.fetcher.getJson({
      url: this.sourceConfig.endpoint,
      params: {
        q: this.sourceConfig.query,
        sort: 'stars',
        order: 'desc',
        per_page: this.sourceConfig.perPage
      },
      headers,
      source: this.source
    });

    if (!isRecord(payload) || !Array.isArray(payload.items)) {
      throw this.malformed('GitHub search response has no items array', { endpoint: this.sourceConfig.endpoint });
    }

    return {
      endpoint: this.sourceConfig.endpoint,
      payload,
      itemCount: payload.items.length
    };
  }
}
