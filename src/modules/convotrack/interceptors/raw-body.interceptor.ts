import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  RawBodyRequest,
} from '@nestjs/common';
import type { Request } from 'express';
import { Observable } from 'rxjs';

/**
 * Raw Body Interceptor
 *
 * Hands the exact request bytes to the handler's @Body() so the signature is
 * checked against what the platform signed
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RawBodyRequest<Request>>();

    if (request.rawBody) {
      // Captured by NestFactory.create(..., { rawBody: true })
      request.body = request.rawBody;
    } else if (Buffer.isBuffer(request.body)) {
      request.rawBody = request.body;
    } else if (typeof request.body === 'string') {
      request.rawBody = Buffer.from(request.body);
      request.body = request.rawBody;
    } else {
      // Parsed without the raw bytes; an empty buffer fails verification
      request.rawBody = Buffer.alloc(0);
      request.body = request.rawBody;
    }

    return next.handle();
  }
}
