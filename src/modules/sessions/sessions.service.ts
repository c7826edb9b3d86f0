import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { DiscoverySession } from '../../database/entities';
import { CreateSessionDto, SessionResponseDto, UpdateSettingsDto } from './dto/session.dto';

/**
 * 会话存储
 * 所有状态仅保存在进程内存中，重启即丢失
 */
@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);
  private readonly sessions = new Map<string, DiscoverySession>();
  private readonly ttlMinutes: number;
  private readonly serverApiKey: string;

  constructor(private configService: ConfigService) {
    this.ttlMinutes = this.configService.get<number>('session.ttlMinutes') || 120;
    this.serverApiKey = this.configService.get<string>('elevenlabs.apiKey') || '';
  }

  /**
   * 创建会话
   * 没有任何可用 key 时默认开启演示模式
   */
  createSession(dto: CreateSessionDto = {}): DiscoverySession {
    const apiKey = dto.api_key?.trim() || null;
    const now = new Date().toISOString();

    const session: DiscoverySession = {
      id: uuidv4(),
      api_key: apiKey,
      demo_mode: apiKey ? false : dto.demo_mode ?? !this.serverApiKey,
      processing: false,
      results: [],
      errors: [],
      created_at: now,
      last_seen_at: now,
    };

    this.sessions.set(session.id, session);
    this.logger.log(`Session created: ${session.id} (demo_mode=${session.demo_mode})`);
    return session;
  }

  /**
   * 查找会话并刷新最近访问时间
   */
  findSession(sessionId: string): DiscoverySession | undefined {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.last_seen_at = new Date().toISOString();
    }
    return session;
  }

  /**
   * 更新会话设置
   * 提供非空 key 时关闭演示模式
   */
  updateSettings(session: DiscoverySession, dto: UpdateSettingsDto): DiscoverySession {
    if (dto.api_key !== undefined) {
      session.api_key = dto.api_key.trim() || null;
    }
    if (dto.demo_mode !== undefined) {
      session.demo_mode = dto.demo_mode;
    }
    if (session.api_key && dto.api_key !== undefined) {
      session.demo_mode = false;
    }
    return session;
  }

  /**
   * 会话可用的 key：优先会话自己的，其次服务端默认
   */
  resolveApiKey(session: DiscoverySession): string | null {
    return session.api_key || this.serverApiKey || null;
  }

  deleteSession(sessionId: string): boolean {
    const deleted = this.sessions.delete(sessionId);
    if (deleted) {
      this.logger.log(`Session ended: ${sessionId}`);
    }
    return deleted;
  }

  /**
   * 清理闲置超时的会话，处理中的会话不清理
   */
  purgeExpired(now: number = Date.now()): string[] {
    const threshold = now - this.ttlMinutes * 60 * 1000;
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (!session.processing && Date.parse(session.last_seen_at) < threshold) {
        this.sessions.delete(id);
        expired.push(id);
      }
    }

    return expired;
  }

  count(): number {
    return this.sessions.size;
  }

  toResponse(session: DiscoverySession): SessionResponseDto {
    return {
      session_id: session.id,
      demo_mode: session.demo_mode,
      has_api_key: this.resolveApiKey(session) !== null,
      processing: session.processing,
      result_count: session.results.length,
      created_at: session.created_at,
    };
  }
}
