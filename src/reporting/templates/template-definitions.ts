/**
 * 报告区块模板定义
 */

import { SourceId } from '../../collection/types/raw-record';

export const LAST_UPDATED_SECTION = 'last-updated';

/** 报告区块标识 */
export type SectionId = SourceId | typeof LAST_UPDATED_SECTION;

export interface TableSectionTemplate {
  id: SourceId;
  /** 区块标题 */
  heading: string;
  /** 表头与分隔行 */
  tableHeader: string;
  /** 每条记录一行 */
  row: string;
  /** 无数据时的占位行 */
  emptyRow: string;
  /** 汇总统计，有数据时输出 */
  summary: string;
}

export interface FooterTemplate {
  id: typeof LAST_UPDATED_SECTION;
  text: string;
}

const NO_DATA = '*No data available for this run*';

export const GITHUB_TRENDING_TEMPLATE: TableSectionTemplate = {
  id: SourceId.GITHUB_TRENDING,
  heading: '### GitHub Trending Repositories (Last Updated: {{runTimestamp|timestamp}})',
  tableHeader: [
    '| Repository | Stars | Language | Description |',
    '|------------|-------|----------|-------------|'
  ].join('\n'),
  row: '| [{{name|cell}}]({{url|url}}) | {{stars|integer}} | {{language|cell}} | {{description|cell}} |',
  emptyRow: `| ${NO_DATA} | - | - | - |`,
  summary: '**{{count}}** repositories tracked with **{{totalStars|integer}}** stars in total '
    + '(mean {{meanStars|integer}}, top: {{topRepository|cell}} with {{maxStars|integer}}), '
    + 'written in {{languageCount}} languages.'
};

export const WEATHER_TEMPLATE: TableSectionTemplate = {
  id: SourceId.WEATHER,
  heading: '### Weather Data Summary',
  tableHeader: [
    '| City | Temperature | Condition | Humidity | Wind |',
    '|------|-------------|-----------|----------|------|'
  ].join('\n'),
  row: '| {{city|cell}} | {{temperatureC|fixed1}}°C ({{temperatureF|fixed1}}°F) | {{condition|cell}} '
    + '| {{humidity|integer}}% | {{windSpeedKmph|fixed1}} km/h ({{windSpeedMps|fixed1}} m/s) |',
  emptyRow: `| ${NO_DATA} | - | - | - | - |`,
  summary: [
    '| Metric | Value |',
    '|--------|-------|',
    '| Cities Tracked | {{cities|cell}} |',
    '| Average Temperature | {{meanTemperatureC|fixed1}}°C ({{meanTemperatureF|fixed1}}°F) |',
    '| Temperature Range | {{minTemperatureC|fixed1}}°C to {{maxTemperatureC|fixed1}}°C |',
    '| Average Humidity | {{meanHumidity|integer}}% |',
    '| Data Points | {{count}} |'
  ].join('\n')
};

export const CRYPTO_TEMPLATE: TableSectionTemplate = {
  id: SourceId.CRYPTO,
  heading: '### Cryptocurrency Prices',
  tableHeader: [
    '| Coin | Price (USD) | Market Cap | 24h Change |',
    '|------|-------------|------------|------------|'
  ].join('\n'),
  row: '| {{coin|cell}} | {{priceUsd|usd}} | ${{marketCapUsd|integer}} | {{trendIcon}} {{change24h|percent}} |',
  emptyRow: `| ${NO_DATA} | - | - | - |`,
  summary: '**{{count}}** coins tracked, mean 24h change {{meanChange|percent}}; '
    + 'best: {{bestCoin|cell}} ({{bestChange|percent}}), worst: {{worstCoin|cell}} ({{worstChange|percent}}).'
};

export const LAST_UPDATED_TEMPLATE: FooterTemplate = {
  id: LAST_UPDATED_SECTION,
  text: '*This report is automatically updated by the data pipeline. '
    + 'Last update: {{runTimestamp|timestamp}} (run {{runId}})*'
};

/**
 * 区块的起止标记
 */
export function sectionMarkers(id: SectionId): { start: string; end: string } {
  return {
    start: `<!-- pipeline:${id}:start -->`,
    end: `<!-- pipeline:${id}:end -->`
  };
}
