/**
 * 测试用的响应样例、伪HTTP实现与临时目录
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { HttpFetcher, JsonRequest } from '../../src/collection/http/request-client';
import { buildConfig, PipelineConfig } from '../../src/system/config';

export type FakeRoute = (request: JsonRequest) => unknown;

/**
 * 按请求返回样例数据；返回Error时以该错误拒绝
 */
export function createFakeFetcher(route: FakeRoute): HttpFetcher & { getJson: jest.Mock<Promise<unknown>, [JsonRequest]> } {
  return {
    getJson: jest.fn(async (request: JsonRequest) => {
      const result = route(request);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    })
  };
}

export interface RepositoryFixture {
  name: string;
  stars: number;
  language?: string | null;
  description?: string | null;
}

export function githubPayload(repositories: RepositoryFixture[]): Record<string, unknown> {
  return {
    total_count: repositories.length,
    incomplete_results: false,
    items: repositories.map(repo => ({
      full_name: repo.name,
      stargazers_count: repo.stars,
      language: repo.language === undefined ? 'TypeScript' : repo.language,
      description: repo.description === undefined ? `About ${repo.name}` : repo.description,
      html_url: `https://github.com/${repo.name}`,
      updated_at: '2024-01-15T08:00:00Z'
    }))
  };
}

export function weatherResponse(tempC: number | null, humidity: number, windKmph: number, description: string): Record<string, unknown> {
  return {
    current_condition: [
      {
        temp_C: tempC === null ? undefined : String(tempC),
        temp_F: tempC === null ? '50' : String(Math.round(tempC * 9 / 5 + 32)),
        humidity: String(humidity),
        windspeedKmph: String(windKmph),
        weatherDesc: [{ value: description }]
      }
    ]
  };
}

export function cryptoPayload(): Record<string, unknown> {
  return {
    bitcoin: { usd: 43250.5, usd_market_cap: 847000000000, usd_24h_change: 2.5 },
    ethereum: { usd: 2250.25, usd_market_cap: 270000000000, usd_24h_change: -1.2 }
  };
}

export function createTempDir(prefix: string = 'pipeline-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * 以临时目录为数据根目录构建配置
 */
export function createTestConfig(dir: string, env: Record<string, string> = {}): PipelineConfig {
  return buildConfig({
    DATA_DIR: path.join(dir, 'data'),
    REPORT_PATH: path.join(dir, 'README.md'),
    WEATHER_CITIES: 'Vancouver,Seattle',
    CRYPTO_COINS: 'bitcoin,ethereum',
    LOG_LEVEL: 'error',
    ...env
  });
}

/**
 * 包含全部区块标记的报告文档
 */
export const REPORT_TEMPLATE = [
  '# Daily Data',
  '',
  'Static introduction.',
  '',
  '<!-- pipeline:github-trending:start -->',
  'old trending',
  '<!-- pipeline:github-trending:end -->',
  '',
  '<!-- pipeline:weather:start -->',
  'old weather',
  '<!-- pipeline:weather:end -->',
  '',
  '<!-- pipeline:crypto:start -->',
  'old crypto',
  '<!-- pipeline:crypto:end -->',
  '',
  'Footer prose.',
  '<!-- pipeline:last-updated:start -->',
  '<!-- pipeline:last-updated:end -->',
  ''
].join('\n');
