import { EntityMention } from '../../database/entities';
import { escapeHtml } from '../../common/utils/html';

export const PARAGRAPH_BREAK = '</p><p>';
export const LINE_BREAK = '<br>';

interface ClaimedRange {
  start: number;
  end: number;
  type: string;
}

/**
 * 实体文本 -> 类型
 * 同一文本出现多个类型时保留最后一个
 */
export function buildEntityTypeMap(mentions: readonly EntityMention[]): Map<string, string> {
  const types = new Map<string, string>();
  for (const mention of mentions) {
    if (mention.text) {
      types.set(mention.text, mention.type);
    }
  }
  return types;
}

export function renderEntityTag(text: string, type: string): string {
  return `<span class="entity-tag" title="${escapeHtml(type)}">${escapeHtml(text)}</span>`;
}

/**
 * 在原文上定位所有实体出现位置
 * 长文本优先占位，短文本只能占用未被占用的区间（"John Smith" 先于 "John"）
 * 按子串匹配，不考虑词边界
 */
function claimRanges(text: string, types: Map<string, string>): ClaimedRange[] {
  const targets = [...types.keys()].sort((a, b) => b.length - a.length);
  const claimed: ClaimedRange[] = [];

  for (const target of targets) {
    const type = types.get(target) ?? '';
    let from = 0;
    while (from <= text.length - target.length) {
      const idx = text.indexOf(target, from);
      if (idx === -1) break;
      const end = idx + target.length;
      if (claimed.some((r) => idx < r.end && end > r.start)) {
        from = idx + 1;
        continue;
      }
      claimed.push({ start: idx, end, type });
      from = end;
    }
  }

  return claimed.sort((a, b) => a.start - b.start);
}

/**
 * 将换行转为段落 / 换行标记
 */
export function toDisplayBreaks(markup: string): string {
  return markup.replace(/\n\n/g, PARAGRAPH_BREAK).replace(/\n/g, LINE_BREAK);
}

/**
 * 高亮转录文本中的实体，返回可直接渲染的 HTML 片段
 * 对已高亮的输出再次调用不保证幂等
 */
export function highlightEntities(text: string, mentions: readonly EntityMention[]): string {
  const ranges = claimRanges(text, buildEntityTypeMap(mentions));

  let cursor = 0;
  let markup = '';
  for (const range of ranges) {
    markup += escapeHtml(text.slice(cursor, range.start));
    markup += renderEntityTag(text.slice(range.start, range.end), range.type);
    cursor = range.end;
  }
  markup += escapeHtml(text.slice(cursor));

  return toDisplayBreaks(markup);
}
