import { RawRecord, SourceId } from '../../collection/types/raw-record';
import { CandidateRecord } from '../types/processed-record';
import { transformGithubTrending } from './github-trending';
import { transformWeather } from './weather';
import { transformCrypto } from './crypto';

export type Transformer = (raw: RawRecord) => CandidateRecord[];

const TRANSFORMERS: Record<SourceId, Transformer> = {
  [SourceId.GITHUB_TRENDING]: transformGithubTrending,
  [SourceId.WEATHER]: transformWeather,
  [SourceId.CRYPTO]: transformCrypto
};

/**
 * 按数据源选择转换规则
 */
export function transformRawRecord(raw: RawRecord): CandidateRecord[] {
  return TRANSFORMERS[raw.source](raw);
}

export { transformGithubTrending, transformWeather, transformCrypto };
