import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDateString, IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { MAX_ID } from '@common/pipes/parse-id.pipe';
import { PaginationQueryDto } from '@common/dto/pagination-query.dto';
import { ShowtimeStatus } from '../entities/showtime.entity';

export class SearchShowtimesDto extends PaginationQueryDto {
  @ApiPropertyOptional({ example: '2026-11-02', description: 'Calendar day (UTC) of the start' })
  @IsOptional()
  @IsDateString()
  date?: string;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_ID)
  roomId?: number;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_ID)
  movieId?: number;

  @ApiPropertyOptional({ enum: ShowtimeStatus })
  @IsOptional()
  @IsEnum(ShowtimeStatus)
  status?: ShowtimeStatus;
}
