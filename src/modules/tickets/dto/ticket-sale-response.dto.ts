import { ApiProperty } from '@nestjs/swagger';
import { TicketResponseDto } from './ticket-response.dto';

export class TicketSaleResponseDto {
  @ApiProperty({ example: 25 })
  totalPrice!: number;

  @ApiProperty({ example: 2 })
  totalTickets!: number;

  @ApiProperty({ type: [TicketResponseDto] })
  tickets!: TicketResponseDto[];
}
