import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { STATUS_CODES } from 'http';
import { Response } from 'express';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
  };
}

/**
 * Renders every error as `{"error": {"code", "message"}}`, where code is the
 * HTTP status text. Anything that is not an HttpException becomes a 500.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const message = exception instanceof HttpException ? messageOf(exception) : 'Internal Server Error';

    if (status >= 500) {
      const detail = exception instanceof Error ? exception.stack ?? exception.message : String(exception);
      this.logger.error(`Error handling request: ${detail}`);
    } else {
      this.logger.warn(`Rejected request (${status}): ${message}`);
    }

    const body: ErrorBody = {
      error: {
        code: STATUS_CODES[status] ?? 'Error',
        message,
      },
    };

    response.status(status).json(body);
  }
}

/**
 * ValidationPipe reports a list of constraint messages; the first one is enough for the client
 */
function messageOf(exception: HttpException): string {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return payload;
  }

  const message: unknown = 'message' in payload ? payload.message : undefined;
  if (Array.isArray(message) && typeof message[0] === 'string') {
    return message[0];
  }
  if (typeof message === 'string') {
    return message;
  }
  return exception.message;
}
