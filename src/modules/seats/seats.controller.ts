import { Controller, Get, Param } from '@nestjs/common';
import { ParseIdPipe } from '@common/pipes/parse-id.pipe';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SeatsService } from './seats.service';
import { SeatMapResponseDto } from './dto/seat-map-response.dto';

@ApiTags('seats')
@Controller('seats')
export class SeatsController {
  constructor(private readonly seatsService: SeatsService) {}

  @Get(':showtimeId')
  @ApiOperation({ summary: 'Seat map of a showtime grouped by row' })
  @ApiResponse({ status: 200, description: 'Seat map', type: SeatMapResponseDto })
  @ApiResponse({ status: 404, description: 'Showtime not found' })
  async getSeatMap(
    @Param('showtimeId', ParseIdPipe) showtimeId: number,
  ): Promise<SeatMapResponseDto> {
    return this.seatsService.getSeatMap(showtimeId);
  }
}
