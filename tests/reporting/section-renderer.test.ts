import { SectionRenderer, RenderContext } from '../../src/reporting/section-renderer';
import { CryptoQuote, TrendingRepository, WeatherObservation } from '../../src/processing/types/processed-record';

const context: RenderContext = { runId: '20240115_083000', runTimestamp: '2024-01-15T08:30:00.000Z' };

function repository(name: string, stars: number, language: string, description: string): TrendingRepository {
  return { name, stars, language, description, url: `https://github.com/${name}`, updatedAt: '2024-01-15T08:00:00Z' };
}

const TOP_FIVE: TrendingRepository[] = [
  repository('alpha/one', 456249, 'TypeScript', 'First repo'),
  repository('beta/two', 435818, 'Rust', 'Second | piped'),
  repository('gamma/three', 429292, 'N/A', 'No description'),
  repository('delta/four', 390947, 'TypeScript', 'Fourth'),
  repository('epsilon/five', 380432, 'Go', 'Fifth')
];

describe('SectionRenderer', () => {
  let renderer: SectionRenderer;

  beforeEach(() => {
    renderer = new SectionRenderer();
  });

  describe('热门仓库', () => {
    test('按存储顺序展示星标数', () => {
      const text = renderer.renderTrending(TOP_FIVE, context, 5);

      expect(text).toBe([
        '### GitHub Trending Repositories (Last Updated: 2024-01-15 08:30:00 UTC)',
        '',
        '| Repository | Stars | Language | Description |',
        '|------------|-------|----------|-------------|',
        '| [alpha/one](https://github.com/alpha/one) | 456,249 | TypeScript | First repo |',
        '| [beta/two](https://github.com/beta/two) | 435,818 | Rust | Second \\| piped |',
        '| [gamma/three](https://github.com/gamma/three) | 429,292 | N/A | No description |',
        '| [delta/four](https://github.com/delta/four) | 390,947 | TypeScript | Fourth |',
        '| [epsilon/five](https://github.com/epsilon/five) | 380,432 | Go | Fifth |',
        '',
        '**5** repositories tracked with **2,092,738** stars in total '
          + '(mean 418,548, top: alpha/one with 456,249), written in 3 languages.'
      ].join('\n'));
    });

    test('只展示前N个仓库', () => {
      const text = renderer.renderTrending(TOP_FIVE, context, 2);

      expect(text).toContain('| [beta/two](https://github.com/beta/two) |');
      expect(text).not.toContain('gamma/three](');
    });

    test('链接地址中的括号和空白被编码', () => {
      const odd = { ...repository('zeta/six', 1200, 'Go', 'Sixth'), url: 'https://example.com/a (b)|<c>' };
      const text = renderer.renderTrending([odd], context, 5);

      expect(text.split('\n')[4]).toBe('| [zeta/six](https://example.com/a%20%28b%29%7C%3Cc%3E) | 1,200 | Go | Sixth |');
    });

    test('无数据时输出占位行', () => {
      expect(renderer.renderTrending(null, context, 5)).toBe([
        '### GitHub Trending Repositories (Last Updated: 2024-01-15 08:30:00 UTC)',
        '',
        '| Repository | Stars | Language | Description |',
        '|------------|-------|----------|-------------|',
        '| *No data available for this run* | - | - | - |'
      ].join('\n'));
    });
  });

  test('天气表格与汇总', () => {
    const observations: WeatherObservation[] = [{
      city: 'Vancouver',
      temperatureC: 12,
      temperatureF: 53.6,
      condition: 'Light rain',
      humidity: 80,
      windSpeedKmph: 18,
      windSpeedMps: 5
    }];

    expect(renderer.renderWeather(observations, context)).toBe([
      '### Weather Data Summary',
      '',
      '| City | Temperature | Condition | Humidity | Wind |',
      '|------|-------------|-----------|----------|------|',
      '| Vancouver | 12.0°C (53.6°F) | Light rain | 80% | 18.0 km/h (5.0 m/s) |',
      '',
      '| Metric | Value |',
      '|--------|-------|',
      '| Cities Tracked | Vancouver |',
      '| Average Temperature | 12.0°C (53.6°F) |',
      '| Temperature Range | 12.0°C to 12.0°C |',
      '| Average Humidity | 80% |',
      '| Data Points | 1 |'
    ].join('\n'));
  });

  test('加密货币涨跌图标', () => {
    const quotes: CryptoQuote[] = [
      { coin: 'bitcoin', priceUsd: 43250.5, marketCapUsd: 847000000000, change24h: 2.5, trend: 'up' },
      { coin: 'ethereum', priceUsd: 2250.25, marketCapUsd: 270000000000, change24h: -1.2, trend: 'down' }
    ];

    const lines = renderer.renderCrypto(quotes, context).split('\n');

    expect(lines[4]).toBe('| bitcoin | $43,250.50 | $847,000,000,000 | 📈 +2.50% |');
    expect(lines[5]).toBe('| ethereum | $2,250.25 | $270,000,000,000 | 📉 -1.20% |');
    expect(lines[7]).toContain('best: bitcoin (+2.50%), worst: ethereum (-1.20%).');
  });

  test('更新时间', () => {
    expect(renderer.renderLastUpdated(context)).toBe(
      '*This report is automatically updated by the data pipeline. Last update: 2024-01-15 08:30:00 UTC (run 20240115_083000)*'
    );
  });
});
