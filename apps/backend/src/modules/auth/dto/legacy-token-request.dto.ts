import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString, ValidateIf } from 'class-validator';

export const legacyGrantTypes = ['password', 'refresh_token'] as const;
export type LegacyGrantType = (typeof legacyGrantTypes)[number];

/** OAuth2 token request body (form or JSON), snake_case as on the wire. */
export class LegacyTokenRequestDto {
  @ApiProperty({ enum: legacyGrantTypes, example: 'password' })
  @IsIn(legacyGrantTypes)
  grant_type!: LegacyGrantType;

  @ApiPropertyOptional({ example: 'alice' })
  @ValidateIf((o: LegacyTokenRequestDto) => o.grant_type === 'password')
  @IsString()
  @IsNotEmpty()
  username?: string;

  @ApiPropertyOptional()
  @ValidateIf((o: LegacyTokenRequestDto) => o.grant_type === 'password')
  @IsString()
  @IsNotEmpty()
  password?: string;

  @ApiPropertyOptional()
  @ValidateIf((o: LegacyTokenRequestDto) => o.grant_type === 'refresh_token')
  @IsString()
  @IsNotEmpty()
  refresh_token?: string;

  @ApiPropertyOptional({ example: 'rest-api' })
  @IsOptional()
  @IsString()
  scope?: string;

  @ApiPropertyOptional({ description: 'Client id when not sent as HTTP Basic' })
  @IsOptional()
  @IsString()
  client_id?: string;

  @ApiPropertyOptional({ description: 'Client secret when not sent as HTTP Basic' })
  @IsOptional()
  @IsString()
  client_secret?: string;
}
