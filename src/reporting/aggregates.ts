/**
 * 汇总统计
 */

import { CryptoQuote, TrendingRepository, WeatherObservation } from '../processing/types/processed-record';

export interface NumericSummary {
  count: number;
  total: number;
  mean: number;
  min: number;
  max: number;
}

/**
 * 计算数量、总和、均值、最小值和最大值；空输入返回null
 */
export function summarize(values: number[]): NumericSummary | null {
  if (values.length === 0) {
    return null;
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count: values.length,
    total,
    mean: total / values.length,
    min: Math.min(...values),
    max: Math.max(...values)
  };
}

export interface TrendingSummary {
  count: number;
  totalStars: number;
  meanStars: number;
  maxStars: number;
  topRepository: string;
  languageCount: number;
}

export function summarizeTrending(repositories: TrendingRepository[]): TrendingSummary | null {
  const stars = summarize(repositories.map(repo => repo.stars));
  if (!stars) {
    return null;
  }
  const top = repositories.find(repo => repo.stars === stars.max);
  const languages = new Set(repositories.map(repo => repo.language).filter(language => language !== 'N/A'));

  return {
    count: stars.count,
    totalStars: stars.total,
    meanStars: stars.mean,
    maxStars: stars.max,
    topRepository: top ? top.name : '',
    languageCount: languages.size
  };
}

export interface WeatherSummary {
  count: number;
  cities: string;
  meanTemperatureC: number;
  meanTemperatureF: number;
  minTemperatureC: number;
  maxTemperatureC: number;
  meanHumidity: number;
}

export function summarizeWeather(observations: WeatherObservation[]): WeatherSummary | null {
  const celsius = summarize(observations.map(item => item.temperatureC));
  const fahrenheit = summarize(observations.map(item => item.temperatureF));
  const humidity = summarize(observations.map(item => item.humidity));
  if (!celsius || !fahrenheit || !humidity) {
    return null;
  }

  return {
    count: celsius.count,
    cities: observations.map(item => item.city).join(', '),
    meanTemperatureC: celsius.mean,
    meanTemperatureF: fahrenheit.mean,
    minTemperatureC: celsius.min,
    maxTemperatureC: celsius.max,
    meanHumidity: humidity.mean
  };
}

export interface CryptoSummary {
  count: number;
  meanChange: number;
  bestCoin: string;
  bestChange: number;
  worstCoin: string;
  worstChange: number;
}

export function summarizeCrypto(quotes: CryptoQuote[]): CryptoSummary | null {
  const changes = summarize(quotes.map(quote => quote.change24h));
  if (!changes) {
    return null;
  }
  const best = quotes.find(quote => quote.change24h === changes.max);
  const worst = quotes.find(quote => quote.change24h === changes.min);

  return {
    count: changes.count,
    meanChange: changes.mean,
    bestCoin: best ? best.coin : '',
    bestChange: changes.max,
    worstCoin: worst ? worst.coin : '',
    worstChange: changes.min
  };
}
