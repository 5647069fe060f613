import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { finalize } from 'rxjs/operators';

interface TimedRequest {
  method?: string;
  url?: string;
}

interface TimedResponse {
  statusCode?: number;
}

/**
 * Logs method, path, status and duration of every HTTP request
 */
@Injectable()
export class RequestTimingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<TimedRequest>();
    const response = http.getResponse<TimedResponse>();
    const startTime = Date.now();

    return next.handle().pipe(
      finalize(() => {
        this.logger.log(
          `${request.method ?? '?'} ${request.url ?? '?'} ${response.statusCode ?? '-'} ${Date.now() - startTime}ms`,
        );
      }),
    );
  }
}
