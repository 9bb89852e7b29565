import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  UnauthorizedException,
} from '@nestjs/common';
import type { Response, Request } from 'express';
import { authErrorCodes } from '../errors/auth.errors';

type AuthFailure = { message: string; errorCode: string };

const TOKEN_FAILURE: AuthFailure = {
  message: 'Invalid or expired token',
  errorCode: authErrorCodes.TOKEN_INVALID,
};

// only these reach the client as-is; any other 401 is reported as a bad token
const PASSTHROUGH_CODES: readonly string[] = [
  authErrorCodes.INVALID_CREDENTIALS,
  authErrorCodes.ACCOUNT_DISABLED,
  authErrorCodes.TOKEN_INVALID,
];

const readFailure = (body: string | object): AuthFailure => {
  if (
    typeof body === 'object' &&
    'errorCode' in body &&
    typeof body.errorCode === 'string' &&
    PASSTHROUGH_CODES.includes(body.errorCode) &&
    'message' in body &&
    typeof body.message === 'string'
  ) {
    return { message: body.message, errorCode: body.errorCode };
  }
  return TOKEN_FAILURE;
};

/**
 * Every authentication failure leaves as one 401 shape with a bearer
 * challenge; token failures name `invalid_token` in it.
 */
@Catch(UnauthorizedException)
export class AuthExceptionFilter implements ExceptionFilter {
  catch(exception: UnauthorizedException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const failure = readFailure(exception.getResponse());
    response.setHeader(
      'WWW-Authenticate',
      failure.errorCode === authErrorCodes.TOKEN_INVALID
        ? 'Bearer error="invalid_token"'
        : 'Bearer',
    );

    response.status(401).json({
      statusCode: 401,
      error: 'Unauthorized',
      path: request.url,
      timestamp: new Date().toISOString(),
      ...failure,
    });
  }
}
