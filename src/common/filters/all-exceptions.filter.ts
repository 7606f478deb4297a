import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ClsService } from 'nestjs-cls';
import { AppClsStore } from '../context/cls-store.type';

interface ErrorResponseBody {
  success: false;
  statusCode: number;
  correlationId: string | null;
  timestamp: string;
  path: string;
  method: string;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface ErrorDescription {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reduces any thrown value to the `{ code, message }` shape the API returns.
 * Also used by the dashboard to report failed widgets.
 */
export function describeException(exception: unknown): ErrorDescription {
  if (!(exception instanceof HttpException)) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred. Please try again later.',
    };
  }

  const status = exception.getStatus();
  const response = exception.getResponse();
  const fallbackCode = HttpStatus[status] ?? `HTTP_${status}`;

  if (typeof response === 'string') {
    return { status, code: fallbackCode, message: response };
  }

  const r: Record<string, unknown> = isRecord(response) ? response : {};
  // domain errors carry { code, message, details? }; Nest defaults carry { message, error }
  const code =
    typeof r.code === 'string'
      ? r.code
      : typeof r.error === 'string'
        ? r.error
        : fallbackCode;

  let message = exception.message;
  let details: unknown = r.details;
  if (Array.isArray(r.message)) {
    // class-validator
    message = r.message.join(' ');
    details = details ?? { validationErrors: r.message };
  } else if (typeof r.message === 'string') {
    message = r.message;
  }

  return {
    status,
    code,
    message,
    ...(details !== undefined ? { details } : {}),
  };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(
    private readonly cls: ClsService<AppClsStore>,
  ) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const correlationId = this.cls.get('correlationId') ?? null;
    const { status, code, message, details } = describeException(exception);

    if (!(exception instanceof HttpException)) {
      this.logger.error(
        [
          'unhandled_exception',
          `corrId=${correlationId ?? '-'}`,
          `${req.method} ${req.url}`,
        ].join(' | '),
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    const body: ErrorResponseBody = {
      success: false,
      statusCode: status,
      correlationId,
      timestamp: new Date().toISOString(),
      path: req.url,
      method: req.method,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
    };

    res.status(status).json(body);
  }
}
