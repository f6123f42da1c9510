import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { BaseDomainError } from './base-domain.error';

export type DomainErrorBody = {
  statusCode: number;
  errorCode: string;
  message: string;
};

@Catch(BaseDomainError)
export class DomainExceptionFilter implements ExceptionFilter<BaseDomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: BaseDomainError, host: ArgumentsHost): void {
    const body = DomainExceptionFilter.toBody(exception);

    if (exception.shouldReport) {
      this.logger.error(
        { err: exception, errorCode: exception.errorCode, ...exception.metadata },
        exception.message,
      );
    }

    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
  }

  static toBody(exception: BaseDomainError): DomainErrorBody {
    return {
      // reportable errors are our fault, the rest are bad input
      statusCode: exception.shouldReport
        ? HttpStatus.INTERNAL_SERVER_ERROR
        : HttpStatus.BAD_REQUEST,
      errorCode: exception.errorCode,
      message: exception.message,
    };
  }
}
