import { BatchError } from '../../../database/entities';
import { TranscriptViewDto } from '../../transcripts/dto/transcript-view.dto';

export interface BatchResponseDto {
  results: TranscriptViewDto[];
  errors: BatchError[];
  skipped: string[]; // 超出单批上限未处理的文件
}

export interface ResultListResponseDto {
  items: TranscriptViewDto[];
  errors: BatchError[];
}
