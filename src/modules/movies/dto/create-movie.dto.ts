import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsInt, IsOptional, IsString, Length, Min } from 'class-validator';

export class CreateMovieDto {
  @ApiProperty({ example: 'The Grand Premiere', description: 'Movie title' })
  @IsString()
  @Length(1, 255)
  title!: string;

  @ApiProperty({ example: 128, description: 'Running time in minutes' })
  @IsInt()
  @Min(1)
  durationMinutes!: number;

  @ApiProperty({ example: 'Drama' })
  @IsString()
  @Length(1, 30)
  genre!: string;

  @ApiProperty({ example: '2026-03-14', description: 'Release date (YYYY-MM-DD)' })
  @IsDateString({ strict: true })
  releaseDate!: string;

  @ApiPropertyOptional({ example: 'A story told over one long night.' })
  @IsOptional()
  @IsString()
  description?: string;
}
