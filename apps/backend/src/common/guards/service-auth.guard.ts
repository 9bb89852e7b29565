import { HttpException, Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { TokenInvalidException } from '../errors/auth.errors';

/** Internal routes: service tokens only, no revocation lookup. */
@Injectable()
export class ServiceAuthGuard extends AuthGuard('service-jwt') {
  handleRequest<TUser>(err: unknown, user: TUser | false): TUser {
    if (err instanceof HttpException) throw err;
    if (err || !user) throw new TokenInvalidException();
    return user;
  }
}
