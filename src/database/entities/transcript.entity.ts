/**
 * 结果状态
 */
export enum ResultStatus {
  COMPLETED = 'completed',
}

/**
 * 结果来源
 */
export enum ResultSource {
  ELEVENLABS = 'elevenlabs',
  DEMO = 'demo',
}

/**
 * 转录词（引擎输出，带说话人标识）
 */
export interface TranscriptWord {
  text?: string;
  speaker_id?: string;
}

/**
 * 说话人轮次
 */
export interface SpeakerTurn {
  speaker_label: string; // 如 "Speaker 0"
  content: string;
}

/**
 * 实体提及
 */
export interface EntityMention {
  text: string;
  type: string; // person / date / contract ...
}

/**
 * 单个文件的转录结果（会话内保存，不落库）
 */
export interface TranscriptionResult {
  filename: string;
  text: string; // 格式化后的转录文本（有说话人时按轮次排版）
  raw_text: string;
  entities: EntityMention[];
  status: ResultStatus;
  source: ResultSource;
  language_code: string | null;
  processed_at: string;
}
