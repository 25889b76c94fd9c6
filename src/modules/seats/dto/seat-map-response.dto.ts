import { ApiProperty } from '@nestjs/swagger';
import { SeatStatus } from '../entities/seat.entity';

export class SeatInfoDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  rowNumber!: number;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty({ enum: SeatStatus })
  status!: SeatStatus;
}

export class SeatMapRowDto {
  @ApiProperty()
  row!: number;

  @ApiProperty({ type: [SeatInfoDto] })
  seats!: SeatInfoDto[];
}

export class SeatMapResponseDto {
  @ApiProperty()
  showtimeId!: number;

  @ApiProperty()
  totalSeats!: number;

  @ApiProperty()
  availableSeats!: number;

  @ApiProperty()
  soldSeats!: number;

  @ApiProperty({ description: 'Sold seats as a percentage of the pool (2 decimals)' })
  occupancyPercentage!: number;

  @ApiProperty({ type: [SeatMapRowDto] })
  rows!: SeatMapRowDto[];
}
