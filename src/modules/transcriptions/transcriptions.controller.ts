import { Controller, Get, Post, Req, BadRequestException } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import type { Multipart } from '@fastify/multipart';
import { TranscriptionsService } from './transcriptions.service';
import { collectUpload } from './upload-parts';
import { CurrentSession } from '../../common/decorators/current-session.decorator';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { DiscoverySession } from '../../database/entities';
import { BatchResponseDto, ResultListResponseDto } from './dto/batch.dto';

@Controller('transcriptions')
export class TranscriptionsController {
  constructor(private readonly transcriptionsService: TranscriptionsService) {}

  /**
   * POST /api/transcriptions
   * multipart 上传音频文件，可选 keyterms 字段
   */
  @Post()
  async createBatch(
    @Req() req: FastifyRequest,
    @CurrentSession() session: DiscoverySession,
  ): Promise<BatchResponseDto> {
    if (!req.isMultipart()) {
      throw new BadRequestException({
        code: ErrorCode.INVALID_INPUT,
        message: 'Expected a multipart/form-data upload',
      });
    }

    const parts: AsyncIterableIterator<Multipart> = req.parts();
    const upload = await collectUpload(parts, this.transcriptionsService.getMaxFiles());

    return this.transcriptionsService.processBatch(
      session,
      upload.files,
      upload.keyterms,
      upload.overflow,
    );
  }

  /**
   * GET /api/transcriptions
   * 当前会话的处理结果
   */
  @Get()
  listResults(@CurrentSession() session: DiscoverySession): ResultListResponseDto {
    return this.transcriptionsService.listResults(session);
  }
}
