import { Module } from '@nestjs/common';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';
import { SessionCleanupService } from './session-cleanup.service';

@Module({
  controllers: [SessionsController],
  providers: [SessionsService, SessionCleanupService],
  exports: [SessionsService],
})
export class SessionsModule {}
