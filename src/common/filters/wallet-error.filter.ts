import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { WalletError, WalletErrorKind } from '../errors/wallet.errors';

const STATUS_BY_KIND: Record<WalletErrorKind, HttpStatus> = {
  PricingUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  TransportError: HttpStatus.BAD_GATEWAY,
  AccountUnavailable: HttpStatus.BAD_GATEWAY,
  AuthError: HttpStatus.UNAUTHORIZED,
  PermissionError: HttpStatus.FORBIDDEN,
};

/**
 * Maps wallet errors that escape a handler onto HTTP responses.
 * Only pass-level failures get here; per-credential ones live in the snapshot.
 */
@Catch(WalletError)
export class WalletErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(WalletErrorFilter.name);

  catch(exception: WalletError, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();
    const statusCode = STATUS_BY_KIND[exception.kind];

    this.logger.error(`${request.method} ${request.url} -> ${statusCode}: ${exception.message}`);

    const body: HttpExceptionResponse = {
      statusCode,
      message: exception.message,
      error: exception.name,
      kind: exception.kind,
      code: exception.code,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(statusCode).json(body);
  }
}
