import { ExecutionContext, createParamDecorator } from '@nestjs/common';
import { Response } from 'express';

/**
 * AbortSignal that fires if the client disconnects before the response is sent
 */
export const RequestAbortSignal = createParamDecorator((_data: unknown, ctx: ExecutionContext): AbortSignal => {
  const response = ctx.switchToHttp().getResponse<Response>();
  const controller = new AbortController();

  response.on('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
});
