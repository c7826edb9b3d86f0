import {
  Injectable,
  Logger,
  BadRequestException,
  ConflictException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  AudioFile,
  ElevenLabsService,
  SpeechToTextResult,
} from '../../providers/elevenlabs/elevenlabs.service';
import { SessionsService } from '../sessions/sessions.service';
import { TranscriptsService } from '../transcripts/transcripts.service';
import { formatDiarizedTranscript } from '../transcripts/diarization';
import { ErrorCode } from '../../common/interfaces/response.interface';
import {
  DiscoverySession,
  ResultSource,
  ResultStatus,
  TranscriptionResult,
} from '../../database/entities';
import { getDemoTranscription } from './demo-data';
import { BatchResponseDto, ResultListResponseDto } from './dto/batch.dto';

@Injectable()
export class TranscriptionsService {
  private readonly logger = new Logger(TranscriptionsService.name);
  private readonly maxFiles: number;
  private readonly allowedExtensions: string[];
  private readonly demoDelayMs: number;

  constructor(
    private configService: ConfigService,
    private elevenLabsService: ElevenLabsService,
    private sessionsService: SessionsService,
    private transcriptsService: TranscriptsService,
  ) {
    this.maxFiles = this.configService.get<number>('batch.maxFiles') || 5;
    this.allowedExtensions = this.configService.get<string[]>('batch.allowedExtensions') || [
      'mp3',
      'wav',
    ];
    this.demoDelayMs = this.configService.get<number>('demo.delayMs') ?? 1500;
  }

  getMaxFiles(): number {
    return this.maxFiles;
  }

  /**
   * 解析关键词提示：逗号分隔，去空白，丢弃空项
   */
  parseKeyterms(input?: string): string[] {
    if (!input) return [];
    return input
      .split(',')
      .map((term) => term.trim())
      .filter((term) => term.length > 0);
  }

  /**
   * 处理一批上传的音频（核心逻辑）
   * 清空会话中上一批结果，逐个文件顺序处理，单个文件失败不影响其余文件
   * overflow 为上传时已丢弃内容的超限文件名，只参与类型校验和 skipped 列表
   */
  async processBatch(
    session: DiscoverySession,
    files: AudioFile[],
    keytermsInput?: string,
    overflow: string[] = [],
  ): Promise<BatchResponseDto> {
    // 1. 校验输入
    if (files.length === 0) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'No audio files uploaded',
      });
    }

    const rejected = [...files.map((file) => file.filename), ...overflow].filter(
      (filename) => !this.isAllowedFile(filename),
    );
    if (rejected.length > 0) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: `Unsupported file type: ${rejected.join(', ')}`,
        details: { allowed: this.allowedExtensions },
      });
    }

    // 2. 演示模式或可用 key 二选一；apiKey 为 null 即走演示数据
    const apiKey = session.demo_mode ? null : this.sessionsService.resolveApiKey(session);
    if (!session.demo_mode && apiKey === null) {
      throw new BadRequestException({
        code: ErrorCode.API_KEY_REQUIRED,
        message: 'Please provide an API Key or enable Demo Mode',
      });
    }

    // 3. 同一会话仅允许一个进行中的批次
    if (session.processing) {
      throw new ConflictException({
        code: ErrorCode.CONFLICT,
        message: 'A batch is already being processed in this session',
      });
    }

    // 4. 截断到单批上限
    const batch = files.slice(0, this.maxFiles);
    const skipped = [...files.slice(this.maxFiles).map((file) => file.filename), ...overflow];
    if (skipped.length > 0) {
      this.logger.warn(`Batch limit ${this.maxFiles} reached, skipping: ${skipped.join(', ')}`);
    }

    const keyterms = this.parseKeyterms(keytermsInput);

    session.processing = true;
    session.results = [];
    session.errors = [];

    try {
      for (const [index, file] of batch.entries()) {
        this.logger.log(
          `Processing ${file.filename} (${index + 1}/${batch.length}) for session ${session.id}`,
        );

        try {
          const result =
            apiKey === null
              ? await this.runDemo(file)
              : await this.runTranscription(file, apiKey, keyterms);
          session.results.push(result);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Error processing ${file.filename}: ${message}`);
          session.errors.push({ filename: file.filename, message });
        }
      }
    } finally {
      session.processing = false;
    }

    this.logger.log(
      `Batch complete for session ${session.id}: ${session.results.length} succeeded, ` +
        `${session.errors.length} failed`,
    );

    return {
      results: this.transcriptsService.buildViews(session.results),
      errors: [...session.errors],
      skipped,
    };
  }

  /**
   * 获取会话中的结果
   */
  listResults(session: DiscoverySession): ResultListResponseDto {
    return {
      items: this.transcriptsService.buildViews(session.results),
      errors: [...session.errors],
    };
  }

  /**
   * 引擎输出转为结果记录
   * 有说话人标注时按轮次排版，否则使用原始文本
   */
  toResult(
    filename: string,
    transcription: SpeechToTextResult,
    source: ResultSource,
  ): TranscriptionResult {
    const hasSpeakers = transcription.words.some((word) => word.speaker_id !== undefined);

    return {
      filename,
      text: hasSpeakers ? formatDiarizedTranscript(transcription.words) : transcription.text,
      raw_text: transcription.text,
      entities: transcription.entities,
      status: ResultStatus.COMPLETED,
      source,
      language_code: transcription.language_code,
      processed_at: new Date().toISOString(),
    };
  }

  private async runTranscription(
    file: AudioFile,
    apiKey: string,
    keyterms: string[],
  ): Promise<TranscriptionResult> {
    const transcription = await this.elevenLabsService.transcribe(file, apiKey, { keyterms });
    return this.toResult(file.filename, transcription, ResultSource.ELEVENLABS);
  }

  private async runDemo(file: AudioFile): Promise<TranscriptionResult> {
    if (this.demoDelayMs > 0) {
      await sleep(this.demoDelayMs); // 模拟处理耗时
    }
    return this.toResult(file.filename, getDemoTranscription(), ResultSource.DEMO);
  }

  private isAllowedFile(filename: string): boolean {
    const dot = filename.lastIndexOf('.');
    if (dot === -1) return false;
    return this.allowedExtensions.includes(filename.slice(dot + 1).toLowerCase());
  }
}
