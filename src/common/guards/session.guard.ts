import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { FastifyRequest } from 'fastify';
import { DiscoverySession } from '../../database/entities';
import { SessionsService } from '../../modules/sessions/sessions.service';
import { ErrorCode } from '../interfaces/response.interface';

export const IS_PUBLIC_KEY = 'isPublic';
export const SESSION_HEADER = 'x-session-id';

export interface SessionRequest extends FastifyRequest {
  discoverySession?: DiscoverySession;
}

/**
 * 会话守卫
 * 通过 X-Session-Id 头解析当前浏览器会话并挂到请求对象上
 */
@Injectable()
export class SessionGuard implements CanActivate {
  constructor(
    private reflector: Reflector,
    private sessionsService: SessionsService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    // 检查是否为公开路由
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<SessionRequest>();
    const header = request.headers[SESSION_HEADER];
    const sessionId = Array.isArray(header) ? header[0] : header;
    const session = sessionId ? this.sessionsService.findSession(sessionId) : undefined;

    if (!session) {
      throw new UnauthorizedException({
        code: ErrorCode.UNAUTHORIZED,
        message: 'A valid X-Session-Id header is required; create a session first',
      });
    }

    request.discoverySession = session;
    return true;
  }
}
