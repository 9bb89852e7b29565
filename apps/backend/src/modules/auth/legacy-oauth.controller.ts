import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiBasicAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { legacyOAuthClient } from '../../common/constants/app.constants';
import { publicDecorator } from '../../common/decorators/public.decorator';
import { InvalidCredentialsException } from '../../common/errors/auth.errors';
import { AuthService } from './auth.service';
import { parseBasicCredentials, safeEquals } from './basic-credentials';
import { LegacyTokenRequestDto } from './dto/legacy-token-request.dto';
import type { LegacyTokenResponse } from './interfaces/auth-response.interface';

/**
 * OAuth2-compatible token endpoint kept for external systems that still
 * call the old path. Issues long-lived legacy access tokens.
 */
@ApiTags('Legacy OAuth')
@Controller('app/rest/v2/oauth')
export class LegacyOAuthController {
  private readonly logger = new Logger(LegacyOAuthController.name);

  constructor(private readonly authService: AuthService) {}

  @publicDecorator()
  @Post('token')
  @HttpCode(HttpStatus.OK)
  @ApiBasicAuth()
  @ApiOperation({ summary: 'OAuth2 password / refresh_token grant' })
  @ApiResponse({ status: 200, description: 'Legacy access token issued' })
  @ApiResponse({ status: 401, description: 'Bad client or user credentials' })
  async token(
    @Headers('authorization') authorization: string | undefined,
    @Body() body: LegacyTokenRequestDto,
  ): Promise<LegacyTokenResponse> {
    const client = parseBasicCredentials(authorization) ?? {
      clientId: body.client_id ?? '',
      clientSecret: body.client_secret ?? '',
    };
    if (
      !safeEquals(client.clientId, legacyOAuthClient.CLIENT_ID) ||
      !safeEquals(client.clientSecret, legacyOAuthClient.CLIENT_SECRET)
    ) {
      this.logger.warn(`Rejected legacy token request for client '${client.clientId}'`);
      throw new InvalidCredentialsException();
    }

    if (body.grant_type === 'refresh_token') {
      return this.authService.legacyRefreshGrant(body.refresh_token ?? '');
    }
    return this.authService.legacyPasswordGrant(
      body.username ?? '',
      body.password ?? '',
    );
  }
}
