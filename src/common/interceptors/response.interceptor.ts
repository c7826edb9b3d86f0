import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  StreamableFile,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse } from '../interfaces/response.interface';

const isApiResponse = <T>(value: unknown): value is ApiResponse<T> =>
  typeof value === 'object' && value !== null && 'data' in value && 'error' in value;

/**
 * 统一响应拦截器
 * 将所有成功响应包装为 { data: T, error: null } 格式，文件下载原样返回
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ApiResponse<T> | StreamableFile> {
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T> | StreamableFile> {
    return next.handle().pipe(
      map((data) => {
        if (data instanceof StreamableFile) {
          return data;
        }
        // 如果返回值已经是 ApiResponse 格式，直接返回
        if (isApiResponse<T>(data)) {
          return data;
        }
        return {
          data,
          error: null,
        };
      }),
    );
  }
}
