/**
 * GitHub搜索响应 → 热门仓库候选记录
 */

import { RawRecord, SourceId } from '../../collection/types/raw-record';
import { CandidateRecord } from '../types/processed-record';
import { isRecord, optionalString } from '../../utils/type-guards';
import { malformedPayload, truncate } from './helpers';

export const DESCRIPTION_MAX_LENGTH = 100;

export function transformGithubTrending(raw: RawRecord): CandidateRecord[] {
  const payload = raw.payload;
  if (!isRecord(payload) || !Array.isArray(payload.items)) {
    throw malformedPayload(SourceId.GITHUB_TRENDING, 'GitHub payload has no items array');
  }

  return payload.items.map((item: unknown): CandidateRecord => {
    if (!isRecord(item)) {
      return {};
    }
    const description = optionalString(item, 'description') || 'No description';
    return {
      name: item.full_name,
      stars: item.stargazers_count,
      language: optionalString(item, 'language') || 'N/A',
      description: truncate(description, DESCRIPTION_MAX_LENGTH),
      url: item.html_url,
      updatedAt: item.updated_at
    };
  });
}
