import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  HttpCode,
  SetMetadata,
} from '@nestjs/common';
import { SessionsService } from './sessions.service';
import { CurrentSession } from '../../common/decorators/current-session.decorator';
import { IS_PUBLIC_KEY } from '../../common/guards/session.guard';
import { DiscoverySession } from '../../database/entities';
import { CreateSessionDto, SessionResponseDto, UpdateSettingsDto } from './dto/session.dto';

@Controller('sessions')
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  /**
   * POST /api/sessions
   * 创建浏览器会话
   */
  @Post()
  @SetMetadata(IS_PUBLIC_KEY, true)
  createSession(@Body() dto: CreateSessionDto): SessionResponseDto {
    const session = this.sessionsService.createSession(dto);
    return this.sessionsService.toResponse(session);
  }

  /**
   * GET /api/sessions/current
   */
  @Get('current')
  getCurrentSession(@CurrentSession() session: DiscoverySession): SessionResponseDto {
    return this.sessionsService.toResponse(session);
  }

  /**
   * PATCH /api/sessions/current/settings
   * 设置 API Key / 演示模式
   */
  @Patch('current/settings')
  updateSettings(
    @CurrentSession() session: DiscoverySession,
    @Body() dto: UpdateSettingsDto,
  ): SessionResponseDto {
    return this.sessionsService.toResponse(this.sessionsService.updateSettings(session, dto));
  }

  /**
   * DELETE /api/sessions/current
   */
  @Delete('current')
  @HttpCode(200)
  endSession(@CurrentSession() session: DiscoverySession): { ended: boolean } {
    return { ended: this.sessionsService.deleteSession(session.id) };
  }
}
