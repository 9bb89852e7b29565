import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

export class MenuQueryDto {
  @ApiPropertyOptional({
    description: 'Language code; unsupported codes fall back to uz-UZ',
    example: 'ru-RU',
  })
  @IsOptional()
  @IsString()
  @MaxLength(16)
  lang?: string;
}
