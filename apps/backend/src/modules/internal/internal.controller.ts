import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { serviceOnly } from '../../common/decorators/public.decorator';
import { TokenRevocationService } from '../../common/services/token-revocation.service';
import {
  CacheInvalidationService,
  InvalidationResult,
} from '../authorization/cache-invalidation.service';
import { RevocationCheckDto } from './dto/revocation-check.dto';

/**
 * Service-to-service surface. Bypasses the user bearer guard and accepts
 * only tokens carrying the internal scope.
 */
@ApiTags('Internal')
@serviceOnly()
@Controller('internal')
export class InternalController {
  constructor(
    private readonly revocation: TokenRevocationService,
    private readonly invalidation: CacheInvalidationService,
  ) {}

  @Post('revocations/check')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Is this token id revoked?' })
  async checkRevocation(
    @Body() dto: RevocationCheckDto,
  ): Promise<{ jti: string; revoked: boolean }> {
    return { jti: dto.jti, revoked: await this.revocation.isRevoked(dto.jti) };
  }

  @Post('cache/users/:id/invalidate')
  @HttpCode(HttpStatus.OK)
  invalidateUser(@Param('id') id: string): Promise<InvalidationResult> {
    return this.invalidation.invalidateUser(id);
  }

  @Post('cache/roles/:id/invalidate')
  @HttpCode(HttpStatus.OK)
  invalidateRole(@Param('id') id: string): Promise<InvalidationResult> {
    return this.invalidation.invalidateRole(id);
  }

  @Post('cache/permissions/:id/invalidate')
  @HttpCode(HttpStatus.OK)
  invalidatePermission(@Param('id') id: string): Promise<InvalidationResult> {
    return this.invalidation.invalidatePermission(id);
  }

  @Post('cache/menu/invalidate')
  @HttpCode(HttpStatus.OK)
  async invalidateMenu(): Promise<{ invalidated: true }> {
    await this.invalidation.invalidateMenuStructure();
    return { invalidated: true };
  }

  @Get('cache/stats')
  stats() {
    return this.invalidation.stats();
  }
}
