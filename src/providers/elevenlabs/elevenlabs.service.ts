import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityMention, TranscriptWord } from '../../database/entities';

/**
 * Scribe 转录参数
 * @see https://elevenlabs.io/docs/api-reference/speech-to-text/convert
 */
export interface ElevenLabsTranscriptionOptions {
  /** 模型名称，默认取配置 scribe_v2 */
  modelId?: string;
  /** 音频语言（ISO 639），默认取配置 en */
  languageCode?: string;
  /** 关键词提示，提高专有名词识别率 */
  keyterms?: string[];
  /** 为每个词标注 speaker_id，默认 true */
  diarize?: boolean;
  /** 标注笑声、掌声等音频事件，默认 false */
  tagAudioEvents?: boolean;
}

export interface AudioFile {
  filename: string;
  mimetype: string;
  buffer: Buffer;
}

// 归一化后的转录结果
export interface SpeechToTextResult {
  text: string;
  language_code: string | null;
  words: TranscriptWord[];
  entities: EntityMention[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

@Injectable()
export class ElevenLabsService {
  private readonly logger = new Logger(ElevenLabsService.name);
  private readonly defaultApiKey: string;
  private readonly baseUrl: string;
  private readonly modelId: string;
  private readonly languageCode: string;

  constructor(private configService: ConfigService) {
    this.defaultApiKey = this.configService.get<string>('elevenlabs.apiKey') || '';
    this.baseUrl = (
      this.configService.get<string>('elevenlabs.baseUrl') || 'https://api.elevenlabs.io/v1'
    ).replace(/\/$/, '');
    this.modelId = this.configService.get<string>('elevenlabs.modelId') || 'scribe_v2';
    this.languageCode = this.configService.get<string>('elevenlabs.languageCode') || 'en';

    if (!this.defaultApiKey) {
      this.logger.warn('ELEVENLABS_API_KEY not configured, sessions must supply their own key');
    } else {
      this.logger.log('ElevenLabs service initialized');
    }
  }

  /**
   * 上传音频并同步等待转录结果
   * 不做重试，失败直接抛出
   */
  async transcribe(
    file: AudioFile,
    apiKey: string,
    options: ElevenLabsTranscriptionOptions = {},
  ): Promise<SpeechToTextResult> {
    const form = new FormData();
    form.append('file', new Blob([file.buffer], { type: file.mimetype }), file.filename);
    form.append('model_id', options.modelId || this.modelId);
    form.append('language_code', options.languageCode || this.languageCode);
    form.append('diarize', String(options.diarize ?? true));
    form.append('tag_audio_events', String(options.tagAudioEvents ?? false));
    form.append('entity_detection', 'all');
    for (const term of options.keyterms ?? []) {
      form.append('keyterms', term);
    }

    const response = await fetch(`${this.baseUrl}/speech-to-text`, {
      method: 'POST',
      headers: {
        'xi-api-key': apiKey,
      },
      body: form,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`ElevenLabs API error: ${response.status} - ${error}`);
    }

    const payload: unknown = await response.json();
    const result = this.normalize(payload);

    this.logger.log(
      `ElevenLabs response for ${file.filename}: language=${result.language_code ?? 'unknown'}, ` +
        `words=${result.words.length}, entities=${result.entities.length}`,
    );

    return result;
  }

  /**
   * 归一化引擎输出
   * 只保留 type 为 word 的词（spacing / audio_event 不参与说话人切分）
   */
  private normalize(payload: unknown): SpeechToTextResult {
    if (!isRecord(payload)) {
      throw new Error('ElevenLabs API returned an unexpected payload');
    }

    const rawWords = Array.isArray(payload.words) ? payload.words : [];
    const words: TranscriptWord[] = rawWords
      .filter(isRecord)
      .filter((word) => word.type === undefined || word.type === 'word')
      .map((word) => ({
        text: asString(word.text),
        speaker_id: asString(word.speaker_id),
      }));

    const rawEntities = Array.isArray(payload.entities) ? payload.entities : [];
    const entities: EntityMention[] = rawEntities
      .filter(isRecord)
      .map((entity) => ({
        text: asString(entity.text) ?? '',
        type: asString(entity.entity_type) ?? asString(entity.type) ?? 'unknown',
      }))
      .filter((entity) => entity.text.length > 0);

    return {
      text: asString(payload.text) ?? '',
      language_code: asString(payload.language_code) ?? null,
      words,
      entities,
    };
  }
}
