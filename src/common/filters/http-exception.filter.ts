import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: string = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';
    let details: Record<string, unknown> | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (isRecord(exceptionResponse)) {
        const resp = exceptionResponse;
        // ValidationPipe 的 message 是字符串数组
        if (Array.isArray(resp.message)) {
          message = resp.message.map(String).join('; ');
          details = { errors: resp.message };
        } else {
          message = typeof resp.message === 'string' ? resp.message : exception.message;
        }
        errorCode = typeof resp.code === 'string' ? resp.code : this.mapStatusToErrorCode(status);
        if (isRecord(resp.details)) {
          details = resp.details;
        }
      } else {
        message = typeof exceptionResponse === 'string' ? exceptionResponse : exception.message;
        errorCode = this.mapStatusToErrorCode(status);
      }
    } else if (
      exception instanceof Error &&
      'statusCode' in exception &&
      typeof exception.statusCode === 'number' &&
      exception.statusCode < 500
    ) {
      // Fastify 插件错误（如 multipart 文件超限）
      status = exception.statusCode;
      message = exception.message;
      errorCode = this.mapStatusToErrorCode(status);
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error: {
        code: errorCode,
        message,
        ...(details && { details }),
      },
    };

    response.status(status).send(errorResponse);
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCode.UNAUTHORIZED;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ErrorCode.PAYLOAD_TOO_LARGE;
      default:
        return status < 500 ? ErrorCode.INVALID_INPUT : ErrorCode.INTERNAL_ERROR;
    }
  }
}
