import { Module } from '@nestjs/common';
import { TranscriptsService } from './transcripts.service';

/**
 * 转录展示：说话人排版、实体高亮与统计
 * 无控制器，供转录与导出模块使用
 */
@Module({
  providers: [TranscriptsService],
  exports: [TranscriptsService],
})
export class TranscriptsModule {}
