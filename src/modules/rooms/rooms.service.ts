import { Injectable, ConflictException, NotFoundException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Room } from './entities/room.entity';
import { Showtime, ShowtimeStatus } from '@modules/showtimes/entities/showtime.entity';
import { CreateRoomDto } from './dto/create-room.dto';
import { UpdateRoomDto } from './dto/update-room.dto';
import { PaginationQueryDto, toSkipTake } from '@common/dto/pagination-query.dto';

@Injectable()
export class RoomsService {
  private readonly logger = new Logger(RoomsService.name);

  constructor(
    @InjectRepository(Room)
    private readonly roomRepository: Repository<Room>,
    @InjectRepository(Showtime)
    private readonly showtimeRepository: Repository<Showtime>,
  ) {}

  async create(dto: CreateRoomDto): Promise<Room> {
    const name = dto.name.trim();
    await this.assertNameAvailable(name);

    const room = this.roomRepository.create({
      name,
      rows: dto.rows,
      seatsPerRow: dto.seatsPerRow,
      active: true,
    });

    const saved = await this.roomRepository.save(room);
    this.logger.log(`Room created: ${saved.id} (${saved.rows}x${saved.seatsPerRow})`);
    return saved;
  }

  async findAll(query: PaginationQueryDto): Promise<[Room[], number]> {
    return this.roomRepository.findAndCount({
      order: { id: 'ASC' },
      ...toSkipTake(query),
    });
  }

  async findById(id: number): Promise<Room> {
    const room = await this.roomRepository.findOne({ where: { id } });
    if (!room) {
      throw new NotFoundException(`Room with ID ${id} not found`);
    }
    return room;
  }

  /**
   * Layout changes only affect showtimes created afterwards; existing seat pools are
   * materialized per showtime and stay as they are.
   */
  async update(id: number, dto: UpdateRoomDto): Promise<Room> {
    const existing = await this.findById(id);
    const name = dto.name.trim();

    if (existing.name !== name) {
      await this.assertNameAvailable(name);
    }

    existing.name = name;
    existing.rows = dto.rows;
    existing.seatsPerRow = dto.seatsPerRow;

    return this.roomRepository.save(existing);
  }

  async remove(id: number): Promise<void> {
    const room = await this.findById(id);

    const scheduled = await this.showtimeRepository.countBy({
      roomId: id,
      status: ShowtimeStatus.SCHEDULED,
    });
    if (scheduled > 0) {
      throw new ConflictException(
        `Cannot delete room with ID ${id} because it has scheduled showtimes`,
      );
    }

    room.active = false;
    await this.roomRepository.save(room);
    this.logger.log(`Room deactivated: ${id}`);
  }

  private async assertNameAvailable(name: string): Promise<void> {
    const existing = await this.roomRepository.findOne({ where: { name } });
    if (existing) {
      throw new ConflictException(`Room with name '${name}' already exists`);
    }
  }
}
