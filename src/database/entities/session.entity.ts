import { TranscriptionResult } from './transcript.entity';

/**
 * 批处理中单个文件的失败记录
 */
export interface BatchError {
  filename: string;
  message: string;
}

/**
 * 浏览器会话（仅存在于内存）
 * 持有 API Key、演示模式开关和当前批次的结果
 */
export interface DiscoverySession {
  id: string; // uuid
  api_key: string | null; // 不会返回给客户端
  demo_mode: boolean;
  processing: boolean; // 同一会话同时只允许一个批次
  results: TranscriptionResult[];
  errors: BatchError[];
  created_at: string;
  last_seen_at: string;
}
