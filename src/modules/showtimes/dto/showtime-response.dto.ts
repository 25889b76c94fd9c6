import { ApiProperty } from '@nestjs/swagger';
import { ShowtimeStatus } from '../entities/showtime.entity';

export class ShowtimeResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  startTime!: Date;

  @ApiProperty()
  endTime!: Date;

  @ApiProperty()
  basePrice!: number;

  @ApiProperty({ enum: ShowtimeStatus })
  status!: ShowtimeStatus;

  @ApiProperty()
  roomId!: number;

  @ApiProperty()
  roomName!: string;

  @ApiProperty()
  movieId!: number;

  @ApiProperty()
  movieTitle!: string;
}
