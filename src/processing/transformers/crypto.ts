/**
 * CoinGecko价格响应 → 加密货币报价候选记录
 */

import { RawRecord, SourceId } from '../../collection/types/raw-record';
import { CandidateRecord } from '../types/processed-record';
import { isRecord } from '../../utils/type-guards';
import { malformedPayload, toNumber } from './helpers';

export function transformCrypto(raw: RawRecord): CandidateRecord[] {
  const payload = raw.payload;
  if (!isRecord(payload)) {
    throw malformedPayload(SourceId.CRYPTO, 'Crypto payload is not an object');
  }

  return Object.entries(payload).map(([coin, quote]): CandidateRecord => {
    if (!isRecord(quote)) {
      return { coin };
    }
    const parsedChange = toNumber(quote.usd_24h_change);
    const change24h = parsedChange === undefined ? 0 : parsedChange;
    return {
      coin,
      priceUsd: quote.usd,
      marketCapUsd: quote.usd_market_cap === undefined || quote.usd_market_cap === null ? 0 : quote.usd_market_cap,
      change24h,
      trend: change24h > 0 ? 'up' : 'down'
    };
  });
}
