import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ParseIdPipe } from '@common/pipes/parse-id.pipe';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { TicketsService } from './tickets.service';
import { SellTicketsDto } from './dto/sell-tickets.dto';
import { TicketResponseDto } from './dto/ticket-response.dto';
import { TicketSaleResponseDto } from './dto/ticket-sale-response.dto';
import { Ticket } from './entities/ticket.entity';

@ApiTags('tickets')
@Controller('tickets')
export class TicketsController {
  constructor(private readonly ticketsService: TicketsService) {}

  @Post()
  @ApiOperation({ summary: 'Sell one or more seats of a showtime, all or nothing' })
  @ApiResponse({ status: 201, description: 'Tickets issued', type: TicketSaleResponseDto })
  @ApiResponse({ status: 404, description: 'Showtime not found' })
  @ApiResponse({ status: 409, description: 'At least one selected seat is not available' })
  @ApiResponse({ status: 422, description: 'Showtime is not open for sale' })
  async sell(@Body() dto: SellTicketsDto): Promise<TicketSaleResponseDto> {
    const sale = await this.ticketsService.sell(dto);
    return {
      totalPrice: sale.totalPrice,
      totalTickets: sale.tickets.length,
      tickets: sale.tickets.map((ticket) => this.toResponseDto(ticket)),
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get ticket by ID' })
  @ApiResponse({ status: 200, description: 'Ticket details', type: TicketResponseDto })
  @ApiResponse({ status: 404, description: 'Ticket not found' })
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<TicketResponseDto> {
    const ticket = await this.ticketsService.findById(id);
    return this.toResponseDto(ticket);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Cancel an active ticket and release its seat' })
  @ApiResponse({ status: 204, description: 'Ticket cancelled' })
  @ApiResponse({ status: 404, description: 'Ticket not found' })
  @ApiResponse({ status: 422, description: 'Ticket is not active' })
  async cancel(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.ticketsService.cancel(id);
  }

  @Post(':id/consume')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Mark an active ticket as used at the entrance' })
  @ApiResponse({ status: 204, description: 'Ticket consumed' })
  @ApiResponse({ status: 404, description: 'Ticket not found' })
  @ApiResponse({ status: 422, description: 'Ticket is not active' })
  async consume(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.ticketsService.consume(id);
  }

  private toResponseDto(ticket: Ticket): TicketResponseDto {
    return {
      id: ticket.id,
      owner: ticket.customerName,
      movieTitle: ticket.seat.showtime.movie.title,
      rowNumber: ticket.seat.rowNumber,
      seatNumber: ticket.seat.seatNumber,
      price: ticket.price,
      status: ticket.status,
      purchaseTimestamp: ticket.purchasedAt,
      showStartTime: ticket.seat.showtime.startTime,
    };
  }
}
