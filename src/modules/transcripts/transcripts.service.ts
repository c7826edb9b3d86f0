import { Injectable } from '@nestjs/common';
import { EntityMention, TranscriptionResult } from '../../database/entities';
import { highlightEntities } from './entity-highlighter';
import { EntityCount, TranscriptViewDto } from './dto/transcript-view.dto';

// 只匹配每个轮次开头的 **label**:
const SPEAKER_MARKER = /(^|<\/p><p>)\*\*([^*]+?)\*\*:/g;

@Injectable()
export class TranscriptsService {
  /**
   * 生成单个结果的展示数据
   * 实体高亮之后再把 **Speaker** 标记渲染为粗体
   */
  buildView(result: TranscriptionResult): TranscriptViewDto {
    const highlighted = highlightEntities(result.text, result.entities);

    return {
      filename: result.filename,
      status: result.status,
      source: result.source,
      language_code: result.language_code,
      entity_count: result.entities.length,
      entity_summary: this.summarizeEntities(result.entities),
      entities: result.entities,
      text: result.text,
      display_html: highlighted.replace(SPEAKER_MARKER, '$1<strong>$2</strong>:'),
      processed_at: result.processed_at,
    };
  }

  buildViews(results: readonly TranscriptionResult[]): TranscriptViewDto[] {
    return results.map((result) => this.buildView(result));
  }

  /**
   * 按类型统计实体数量，保持首次出现的顺序
   */
  summarizeEntities(entities: readonly EntityMention[]): EntityCount[] {
    const counts = new Map<string, number>();
    for (const entity of entities) {
      const type = entity.type || 'Unknown';
      counts.set(type, (counts.get(type) ?? 0) + 1);
    }
    return [...counts.entries()].map(([type, count]) => ({ type, count }));
  }
}
