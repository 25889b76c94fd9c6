import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { ParseIdPipe } from '@common/pipes/parse-id.pipe';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { ShowtimesService } from './showtimes.service';
import { CreateShowtimeDto } from './dto/create-showtime.dto';
import { UpdateShowtimeDto } from './dto/update-showtime.dto';
import { SearchShowtimesDto } from './dto/search-showtimes.dto';
import { ShowtimeResponseDto } from './dto/showtime-response.dto';
import { Showtime } from './entities/showtime.entity';
import { Paginated, paginate } from '@common/dto/pagination-query.dto';

@ApiTags('showtimes')
@Controller('showtimes')
export class ShowtimesController {
  constructor(private readonly showtimesService: ShowtimesService) {}

  @Post()
  @ApiOperation({ summary: 'Schedule a showtime and generate its seats' })
  @ApiResponse({ status: 201, description: 'Showtime created', type: ShowtimeResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid time window or inactive room' })
  @ApiResponse({ status: 404, description: 'Room or movie not found' })
  @ApiResponse({ status: 409, description: 'Room already booked for that time' })
  async create(@Body() dto: CreateShowtimeDto): Promise<ShowtimeResponseDto> {
    const showtime = await this.showtimesService.create(dto);
    return this.toResponseDto(showtime);
  }

  @Get()
  @ApiOperation({ summary: 'Search showtimes by day, room, movie and status' })
  async search(@Query() query: SearchShowtimesDto): Promise<Paginated<ShowtimeResponseDto>> {
    const result = await this.showtimesService.search(query);
    return paginate(result, query, (showtime) => this.toResponseDto(showtime));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get showtime by ID' })
  @ApiResponse({ status: 200, description: 'Showtime details', type: ShowtimeResponseDto })
  @ApiResponse({ status: 404, description: 'Showtime not found' })
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<ShowtimeResponseDto> {
    const showtime = await this.showtimesService.findById(id);
    return this.toResponseDto(showtime);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Reschedule or reprice a scheduled showtime' })
  @ApiResponse({ status: 200, description: 'Showtime updated', type: ShowtimeResponseDto })
  @ApiResponse({ status: 409, description: 'Room already booked for that time' })
  @ApiResponse({ status: 422, description: 'Showtime is no longer scheduled' })
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateShowtimeDto,
  ): Promise<ShowtimeResponseDto> {
    const showtime = await this.showtimesService.update(id, dto);
    return this.toResponseDto(showtime);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a scheduled showtime' })
  @ApiResponse({ status: 200, description: 'Showtime cancelled', type: ShowtimeResponseDto })
  @ApiResponse({ status: 422, description: 'Showtime is no longer scheduled' })
  async cancel(@Param('id', ParseIdPipe) id: number): Promise<ShowtimeResponseDto> {
    const showtime = await this.showtimesService.cancel(id);
    return this.toResponseDto(showtime);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a showtime that never sold a ticket' })
  @ApiResponse({ status: 204, description: 'Showtime deleted' })
  @ApiResponse({ status: 409, description: 'Tickets were issued for the showtime' })
  async remove(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.showtimesService.remove(id);
  }

  private toResponseDto(showtime: Showtime): ShowtimeResponseDto {
    return {
      id: showtime.id,
      startTime: showtime.startTime,
      endTime: showtime.endTime,
      basePrice: showtime.basePrice,
      status: showtime.status,
      roomId: showtime.roomId,
      roomName: showtime.room.name,
      movieId: showtime.movieId,
      movieTitle: showtime.movie.title,
    };
  }
}
