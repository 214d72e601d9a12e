import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";
import type { FieldError, ProblemDetails } from "../errors/problem-details.interface";
import { REQUEST_ID_HEADER } from "../middlewares/request-id.middleware";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
    return value.join("; ");
  }
  return undefined;
}

function readFieldErrors(source: Record<string, unknown>): FieldError[] | undefined {
  const value = source.errors;
  if (!Array.isArray(value)) return undefined;
  return value.filter(
    (item): item is FieldError =>
      isRecord(item) && typeof item.field === "string" && typeof item.message === "string",
  );
}

/**
 * Converts every exception into an RFC 7807 problem document.
 * 5xx responses are logged with stack traces, 4xx responses as warnings.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;

    const problem = this.toProblem(exception, status);
    problem.instance = httpAdapter.getRequestUrl(request);
    const requestId = request.headers?.[REQUEST_ID_HEADER];
    if (typeof requestId === "string") {
      problem.requestId = requestId;
    }

    this.logError(exception, request, status, problem);

    httpAdapter.reply(ctx.getResponse(), problem, status);
  }

  private toProblem(exception: unknown, status: number): ProblemDetails {
    const fallbackType = HttpStatus[status] ?? "INTERNAL_SERVER_ERROR";

    if (!(exception instanceof HttpException)) {
      return {
        type: "INTERNAL_SERVER_ERROR",
        title: "Internal Server Error",
        status,
        detail: "An unexpected error occurred",
      };
    }

    const response = exception.getResponse();
    if (typeof response === "string") {
      return { type: fallbackType, title: fallbackType, status, detail: response };
    }
    if (!isRecord(response)) {
      return { type: fallbackType, title: fallbackType, status, detail: exception.message };
    }

    const type = readString(response, "type") ?? fallbackType;
    const errorCode = readString(response, "errorCode");
    const errors = readFieldErrors(response);
    const details = isRecord(response.details) ? response.details : undefined;

    return {
      type,
      title: readString(response, "title") ?? type,
      status,
      detail:
        readString(response, "detail") ?? readString(response, "message") ?? exception.message,
      ...(errorCode && { errorCode }),
      ...(errors && { errors }),
      ...(details && { details }),
    };
  }

  private logError(
    exception: unknown,
    request: Request,
    status: number,
    { errorCode, requestId }: ProblemDetails,
  ) {
    const prefix = `${requestId ? `(${requestId}) ` : ""}${errorCode ? `[${errorCode}] ` : ""}`;
    const target = `${request.method ?? "unknown"} ${request.url ?? "unknown"}`;

    if (status >= 500) {
      if (exception instanceof Error) {
        this.logger.error(`${prefix}${target} - ${exception.message}`, exception.stack);
      } else {
        this.logger.error(`${prefix}${target} - Unknown error`, String(exception));
      }
      return;
    }

    const message = exception instanceof Error ? exception.message : String(exception);
    this.logger.warn(`${prefix}${target} - ${message}`);
  }
}
