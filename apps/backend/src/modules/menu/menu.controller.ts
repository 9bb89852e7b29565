import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Authenticated } from '../../common/decorators/authenticated.decorator';
import { currentUser } from '../../common/decorators/current-user.decorator';
import { TokenInvalidException } from '../../common/errors/auth.errors';
import type { AuthenticatedUser } from '../auth/interfaces/authenticated-user.interface';
import { MenuQueryDto } from './dto/menu-query.dto';
import { MenuService, normalizeLanguage } from './menu.service';
import type { MenuNode } from './menu.types';

@ApiTags('Menu')
@Controller('menu')
export class MenuController {
  constructor(private readonly menuService: MenuService) {}

  @Get()
  @Authenticated()
  @ApiOperation({ summary: "Current user's permission-filtered menu" })
  @ApiResponse({ status: 200, description: 'Menu tree for the language' })
  async getMenu(
    @currentUser() user: AuthenticatedUser | undefined,
    @Query() query: MenuQueryDto,
  ): Promise<{ language: string; items: MenuNode[] }> {
    if (!user) throw new TokenInvalidException();
    const language = normalizeLanguage(query.lang);
    const items = await this.menuService.getMenu(
      user.id,
      new Set(user.permissions),
      language,
    );
    return { language, items };
  }
}
