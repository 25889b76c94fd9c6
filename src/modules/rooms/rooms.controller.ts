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
import { RoomsService } from './rooms.service';
import { CreateRoomDto } from './dto/create-room.dto';
import { UpdateRoomDto } from './dto/update-room.dto';
import { RoomResponseDto } from './dto/room-response.dto';
import { Room } from './entities/room.entity';
import { Paginated, PaginationQueryDto, paginate } from '@common/dto/pagination-query.dto';

@ApiTags('rooms')
@Controller('rooms')
export class RoomsController {
  constructor(private readonly roomsService: RoomsService) {}

  @Post()
  @ApiOperation({ summary: 'Create a room with a fixed seat grid' })
  @ApiResponse({ status: 201, description: 'Room created', type: RoomResponseDto })
  @ApiResponse({ status: 409, description: 'Room name already in use' })
  async create(@Body() dto: CreateRoomDto): Promise<RoomResponseDto> {
    const room = await this.roomsService.create(dto);
    return this.toResponseDto(room);
  }

  @Get()
  @ApiOperation({ summary: 'List rooms' })
  async findAll(@Query() query: PaginationQueryDto): Promise<Paginated<RoomResponseDto>> {
    const result = await this.roomsService.findAll(query);
    return paginate(result, query, (room) => this.toResponseDto(room));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get room by ID' })
  @ApiResponse({ status: 200, description: 'Room details', type: RoomResponseDto })
  @ApiResponse({ status: 404, description: 'Room not found' })
  async findOne(@Param('id', ParseIdPipe) id: number): Promise<RoomResponseDto> {
    const room = await this.roomsService.findById(id);
    return this.toResponseDto(room);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Replace room name and layout' })
  @ApiResponse({ status: 200, description: 'Room updated', type: RoomResponseDto })
  @ApiResponse({ status: 404, description: 'Room not found' })
  @ApiResponse({ status: 409, description: 'Room name already in use' })
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() dto: UpdateRoomDto,
  ): Promise<RoomResponseDto> {
    const room = await this.roomsService.update(id, dto);
    return this.toResponseDto(room);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Deactivate a room without scheduled showtimes' })
  @ApiResponse({ status: 204, description: 'Room deactivated' })
  @ApiResponse({ status: 409, description: 'Room has scheduled showtimes' })
  async remove(@Param('id', ParseIdPipe) id: number): Promise<void> {
    await this.roomsService.remove(id);
  }

  private toResponseDto(room: Room): RoomResponseDto {
    return {
      id: room.id,
      name: room.name,
      rows: room.rows,
      seatsPerRow: room.seatsPerRow,
      capacity: room.rows * room.seatsPerRow,
      active: room.active,
    };
  }
}
