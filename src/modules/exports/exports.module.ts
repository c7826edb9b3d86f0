import { Module } from '@nestjs/common';
import { ExportsController } from './exports.controller';
import { ExportsService } from './exports.service';
import { TranscriptsModule } from '../transcripts/transcripts.module';

@Module({
  imports: [TranscriptsModule],
  controllers: [ExportsController],
  providers: [ExportsService],
})
export class ExportsModule {}
