import { Module } from '@nestjs/common';
import { TranscriptionsController } from './transcriptions.controller';
import { TranscriptionsService } from './transcriptions.service';
import { SessionsModule } from '../sessions/sessions.module';
import { TranscriptsModule } from '../transcripts/transcripts.module';

@Module({
  imports: [SessionsModule, TranscriptsModule],
  controllers: [TranscriptionsController],
  providers: [TranscriptionsService],
})
export class TranscriptionsModule {}
