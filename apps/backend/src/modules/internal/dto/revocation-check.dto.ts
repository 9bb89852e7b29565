import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

export class RevocationCheckDto {
  @ApiProperty({ description: 'Token id (jti) to look up' })
  @IsString()
  @IsNotEmpty()
  jti!: string;
}
