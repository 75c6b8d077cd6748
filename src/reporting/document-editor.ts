/**
 * 报告文档编辑
 * 先定位所有区块的起止偏移，再在偏移之间整体替换；任何区块定位失败时不做修改
 */

import { PipelineError, PipelineErrorType } from '../utils/error-handler';
import { SectionId, sectionMarkers } from './templates/template-definitions';

export interface SectionRange {
  id: SectionId;
  /** 起始标记之后的偏移 */
  contentStart: number;
  /** 结束标记所在的偏移 */
  contentEnd: number;
}

export interface SectionContent {
  id: SectionId;
  content: string;
}

function renderError(message: string, id: SectionId, details?: Record<string, unknown>): PipelineError {
  return new PipelineError(message, PipelineErrorType.RENDER_ERROR, undefined, 'locateSection', { section: id, ...details });
}

function countOccurrences(text: string, search: string): number {
  let count = 0;
  let index = text.indexOf(search);
  while (index !== -1) {
    count++;
    index = text.indexOf(search, index + search.length);
  }
  return count;
}

/**
 * 定位区块内容范围，标记缺失、重复或顺序颠倒时抛出渲染错误
 */
export function locateSection(document: string, id: SectionId): SectionRange {
  const markers = sectionMarkers(id);

  const startCount = countOccurrences(document, markers.start);
  const endCount = countOccurrences(document, markers.end);
  if (startCount === 0 || endCount === 0) {
    throw renderError(`Section "${id}" markers are missing`, id, {
      startMarkerFound: startCount > 0,
      endMarkerFound: endCount > 0
    });
  }
  if (startCount > 1 || endCount > 1) {
    throw renderError(`Section "${id}" markers appear more than once`, id, { startCount, endCount });
  }

  const startIndex = document.indexOf(markers.start);
  const endIndex = document.indexOf(markers.end);
  if (endIndex < startIndex + markers.start.length) {
    throw renderError(`Section "${id}" end marker precedes its start marker`, id);
  }

  return { id, contentStart: startIndex + markers.start.length, contentEnd: endIndex };
}

/**
 * 用渲染结果替换各区块标记之间的内容，返回新文档
 */
export function applySections(document: string, sections: SectionContent[]): string {
  const ranges = sections.map(section => ({ range: locateSection(document, section.id), content: section.content }));

  const ordered = [...ranges].sort((a, b) => a.range.contentStart - b.range.contentStart);
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].range.contentStart < ordered[i - 1].range.contentEnd) {
      throw renderError(
        `Section "${ordered[i].range.id}" overlaps section "${ordered[i - 1].range.id}"`,
        ordered[i].range.id
      );
    }
  }

  let result = document;
  for (const { range, content } of [...ordered].reverse()) {
    result = `${result.slice(0, range.contentStart)}\n${content}\n${result.slice(range.contentEnd)}`;
  }
  return result;
}
