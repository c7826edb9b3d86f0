import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { SessionsService } from './sessions.service';

/**
 * 会话清理服务
 * 定期移除闲置超时的浏览器会话，释放内存中的转录结果
 */
@Injectable()
export class SessionCleanupService implements OnModuleInit {
  private readonly logger = new Logger(SessionCleanupService.name);

  constructor(private sessionsService: SessionsService) {}

  onModuleInit() {
    this.cleanupExpiredSessions();
  }

  /**
   * 每 5 分钟清理一次
   */
  @Cron(CronExpression.EVERY_5_MINUTES)
  handleCron() {
    this.cleanupExpiredSessions();
  }

  cleanupExpiredSessions(): number {
    const expired = this.sessionsService.purgeExpired();

    if (expired.length === 0) {
      this.logger.debug('No expired sessions found');
      return 0;
    }

    this.logger.log(
      `Purged ${expired.length} expired sessions, ${this.sessionsService.count()} active: ${expired.join(', ')}`,
    );
    return expired.length;
  }
}
