import { ExecutionContext, HttpException, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import { isPublicKey } from '../decorators/public.decorator';
import { TokenInvalidException } from '../errors/auth.errors';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  canActivate(context: ExecutionContext) {
    const isPublic = this.reflector.getAllAndOverride<boolean>(isPublicKey, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }
    return super.canActivate(context);
  }

  // every failure (missing, malformed, expired, revoked) reads the same
  handleRequest<TUser>(err: unknown, user: TUser | false): TUser {
    if (err instanceof HttpException) throw err;
    if (err || !user) throw new TokenInvalidException();
    return user;
  }
}
