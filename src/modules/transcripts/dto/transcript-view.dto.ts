import { EntityMention } from '../../../database/entities';

export interface EntityCount {
  type: string;
  count: number;
}

export interface TranscriptViewDto {
  filename: string;
  status: string;
  source: string;
  language_code: string | null;
  entity_count: number;
  entity_summary: EntityCount[];
  entities: EntityMention[];
  text: string;
  display_html: string;
  processed_at: string;
}
