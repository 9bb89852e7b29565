import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../../common/decorators/authenticated.decorator';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { publicDecorator } from '../../common/decorators/public.decorator';
import { TokenInvalidException } from '../../common/errors/auth.errors';
import { AuthService } from './auth.service';
import { LoginDto } from './dto/login.dto';
import { LogoutDto } from './dto/logout.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import type {
  AuthResponse,
  CurrentUserResponse,
} from './interfaces/auth-response.interface';
import type { AuthenticatedUser } from './interfaces/authenticated-user.interface';

const authResponseSchema = {
  type: 'object',
  properties: {
    user: {
      type: 'object',
      properties: {
        id: { type: 'string' },
        username: { type: 'string' },
        sourceStore: { type: 'string', enum: ['MODERN', 'LEGACY'] },
      },
    },
    accessToken: { type: 'string' },
    refreshToken: { type: 'string' },
    tokenType: { type: 'string', example: 'Bearer' },
    expiresIn: { type: 'number', example: 43200 },
    scope: { type: 'array', items: { type: 'string' } },
  },
};

@ApiTags('Authentication')
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @publicDecorator()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Login against the modern or legacy credential store' })
  @ApiResponse({ status: 200, description: 'Tokens issued', schema: authResponseSchema })
  @ApiResponse({ status: 401, description: 'Invalid credentials or disabled account' })
  login(@Body() loginDto: LoginDto): Promise<AuthResponse> {
    return this.authService.login(loginDto);
  }

  @publicDecorator()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a refresh token for a new token pair' })
  @ApiResponse({ status: 200, description: 'Tokens issued', schema: authResponseSchema })
  @ApiResponse({ status: 401, description: 'Invalid, expired or revoked refresh token' })
  refresh(@Body() refreshTokenDto: RefreshTokenDto): Promise<AuthResponse> {
    return this.authService.refresh(refreshTokenDto.refreshToken);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @Authenticated()
  @ApiOperation({ summary: 'Revoke the current access token (and refresh token)' })
  @ApiResponse({ status: 200, description: 'Logged out' })
  async logout(
    @currentUser() user: AuthenticatedUser | undefined,
    @Body() logoutDto: LogoutDto,
  ): Promise<{ message: string }> {
    if (!user) throw new TokenInvalidException();
    await this.authService.logout(user, logoutDto.refreshToken);
    return { message: 'Logged out successfully' };
  }

  @Get('me')
  @Authenticated()
  @ApiOperation({ summary: 'Current user with effective permissions' })
  @ApiResponse({ status: 200, description: 'Current user' })
  me(@currentUser() user: AuthenticatedUser | undefined): CurrentUserResponse {
    if (!user) throw new TokenInvalidException();
    return this.authService.me(user);
  }
}
