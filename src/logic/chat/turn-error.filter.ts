import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { ModelTimeoutError, SessionBusyError, TurnError } from '../../utils/errors';

/** Maps turn-level failures to `{ error }` replies. */
@Catch(TurnError)
export class TurnErrorFilter implements ExceptionFilter {
  catch(exception: TurnError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    response.status(statusFor(exception)).json({ error: exception.message });
  }
}

export function statusFor(error: TurnError): HttpStatus {
  if (error instanceof SessionBusyError) {
    return HttpStatus.CONFLICT;
  }
  if (error instanceof ModelTimeoutError) {
    return HttpStatus.GATEWAY_TIMEOUT;
  }
  return HttpStatus.BAD_GATEWAY;
}
