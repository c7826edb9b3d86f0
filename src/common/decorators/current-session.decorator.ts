import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { DiscoverySession } from '../../database/entities';
import { SessionRequest } from '../guards/session.guard';
import { ErrorCode } from '../interfaces/response.interface';

/**
 * 获取当前会话装饰器
 * 依赖 SessionGuard 先把会话挂到请求对象上
 */
export const CurrentSession = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): DiscoverySession => {
    const request = ctx.switchToHttp().getRequest<SessionRequest>();
    if (!request.discoverySession) {
      throw new UnauthorizedException({
        code: ErrorCode.UNAUTHORIZED,
        message: 'No session attached to this request',
      });
    }
    return request.discoverySession;
  },
);
