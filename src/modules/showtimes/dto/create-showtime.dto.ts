import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsISO8601, IsNumber, Max, Min } from 'class-validator';
import { MAX_ID } from '@common/pipes/parse-id.pipe';

export class CreateShowtimeDto {
  @ApiProperty({ example: '2026-11-02T19:00:00Z', description: 'Showtime start' })
  @IsISO8601()
  startTime!: string;

  @ApiProperty({ example: '2026-11-02T21:15:00Z', description: 'Showtime end' })
  @IsISO8601()
  endTime!: string;

  @ApiProperty({ example: 12.5, description: 'Price charged for every seat' })
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  basePrice!: number;

  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  @Max(MAX_ID)
  roomId!: number;

  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  @Max(MAX_ID)
  movieId!: number;
}
