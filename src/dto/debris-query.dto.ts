import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class DebrisQueryDto {
  @ApiProperty({
    example: 100,
    description:
      'Maximum number of catalog records requested from Space-Track. Defaults to SPACE_TRACK_DEFAULT_LIMIT.',
    required: false,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  limit?: number;
}
