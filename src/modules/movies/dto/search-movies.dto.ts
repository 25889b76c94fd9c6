import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsISO8601, IsOptional, IsString, MaxLength } from 'class-validator';
import { PaginationQueryDto } from '@common/dto/pagination-query.dto';
import { ShowtimeStatus } from '@modules/showtimes/entities/showtime.entity';

export class SearchMoviesDto extends PaginationQueryDto {
  @ApiPropertyOptional({ example: 'premiere', description: 'Case-insensitive partial title' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  title?: string;

  @ApiPropertyOptional({ example: 'dra', description: 'Case-insensitive partial genre' })
  @IsOptional()
  @IsString()
  @MaxLength(30)
  genre?: string;
}

export class MoviesWithShowtimesQueryDto extends PaginationQueryDto {
  @ApiProperty({ example: '2026-03-14T00:00:00Z', description: 'Earliest showtime start' })
  @IsISO8601()
  from!: string;

  @ApiProperty({ enum: ShowtimeStatus, example: ShowtimeStatus.SCHEDULED })
  @IsEnum(ShowtimeStatus)
  status!: ShowtimeStatus;
}
