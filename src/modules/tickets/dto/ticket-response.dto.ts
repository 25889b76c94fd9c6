import { ApiProperty } from '@nestjs/swagger';
import { TicketStatus } from '../entities/ticket.entity';

export class TicketResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty({ description: 'Customer name' })
  owner!: string;

  @ApiProperty()
  movieTitle!: string;

  @ApiProperty()
  rowNumber!: number;

  @ApiProperty()
  seatNumber!: number;

  @ApiProperty()
  price!: number;

  @ApiProperty({ enum: TicketStatus })
  status!: TicketStatus;

  @ApiProperty()
  purchaseTimestamp!: Date;

  @ApiProperty()
  showStartTime!: Date;
}
