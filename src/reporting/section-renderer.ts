/**
 * 区块渲染
 * 由模板和数据生成完整的区块内容
 */

import { CryptoQuote, TrendingRepository, WeatherObservation } from '../processing/types/processed-record';
import { summarizeCrypto, summarizeTrending, summarizeWeather } from './aggregates';
import { TemplateVariables, VariableReplacementEngine } from './templates/variable-replacement-engine';
import {
  CRYPTO_TEMPLATE,
  GITHUB_TRENDING_TEMPLATE,
  LAST_UPDATED_TEMPLATE,
  TableSectionTemplate,
  WEATHER_TEMPLATE
} from './templates/template-definitions';

export interface RenderContext {
  runId: string;
  runTimestamp: string;
}

export class SectionRenderer {
  private engine: VariableReplacementEngine;

  constructor(engine: VariableReplacementEngine = new VariableReplacementEngine()) {
    this.engine = engine;
  }

  /**
   * 渲染热门仓库区块，按存储顺序展示前topN条；records为null表示无数据
   */
  renderTrending(repositories: TrendingRepository[] | null, context: RenderContext, topN: number): string {
    const shown = repositories ? repositories.slice(0, topN) : [];
    const summary = repositories ? summarizeTrending(repositories) : null;

    const rows = shown.map(repo => ({
      name: repo.name,
      url: repo.url,
      stars: repo.stars,
      language: repo.language,
      description: repo.description
    }));

    return this.renderTable(GITHUB_TRENDING_TEMPLATE, rows, summary ? { ...summary } : null, context);
  }

  renderWeather(observations: WeatherObservation[] | null, context: RenderContext): string {
    const rows = (observations || []).map(item => ({
      city: item.city,
      temperatureC: item.temperatureC,
      temperatureF: item.temperatureF,
      condition: item.condition,
      humidity: item.humidity,
      windSpeedKmph: item.windSpeedKmph,
      windSpeedMps: item.windSpeedMps
    }));
    const summary = observations ? summarizeWeather(observations) : null;

    return this.renderTable(WEATHER_TEMPLATE, rows, summary ? { ...summary } : null, context);
  }

  renderCrypto(quotes: CryptoQuote[] | null, context: RenderContext): string {
    const rows = (quotes || []).map(quote => ({
      coin: quote.coin,
      priceUsd: quote.priceUsd,
      marketCapUsd: quote.marketCapUsd,
      change24h: quote.change24h,
      trendIcon: quote.trend === 'up' ? '📈' : '📉'
    }));
    const summary = quotes ? summarizeCrypto(quotes) : null;

    return this.renderTable(CRYPTO_TEMPLATE, rows, summary ? { ...summary } : null, context);
  }

  renderLastUpdated(context: RenderContext): string {
    return this.engine.replaceVariables(LAST_UPDATED_TEMPLATE.text, { ...context });
  }

  /**
   * 标题、表格与汇总；没有数据时只输出占位行
   */
  private renderTable(
    template: TableSectionTemplate,
    rows: TemplateVariables[],
    summary: TemplateVariables | null,
    context: RenderContext
  ): string {
    const heading = this.engine.replaceVariables(template.heading, { ...context });
    const body = rows.length > 0
      ? rows.map(row => this.engine.replaceVariables(template.row, row)).join('\n')
      : template.emptyRow;

    const parts = [heading, `${template.tableHeader}\n${body}`];
    if (rows.length > 0 && summary) {
      parts.push(this.engine.replaceVariables(template.summary, summary));
    }
    return parts.join('\n\n');
  }
}
