import {
  Injectable,
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  And,
  DataSource,
  EntityManager,
  FindOptionsWhere,
  LessThan,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { Showtime, ShowtimeStatus } from './entities/showtime.entity';
import { Room } from '@modules/rooms/entities/room.entity';
import { Ticket } from '@modules/tickets/entities/ticket.entity';
import { MoviesService } from '@modules/movies/movies.service';
import { SeatsService } from '@modules/seats/seats.service';
import { CreateShowtimeDto } from './dto/create-showtime.dto';
import { UpdateShowtimeDto } from './dto/update-showtime.dto';
import { SearchShowtimesDto } from './dto/search-showtimes.dto';
import { TimeWindow, assertValidWindow, utcDayWindow } from './showtime-window.util';
import { showtimeStateMachine, transitionShowtime } from './showtime-status';
import { executeInTransaction } from '@infrastructure/database/transaction.util';
import { isUniqueViolation } from '@common/utils/error.util';
import { toSkipTake } from '@common/dto/pagination-query.dto';

const OVERLAP_MESSAGE = 'A showtime already exists in this room at the specified time.';

@Injectable()
export class ShowtimesService {
  private readonly logger = new Logger(ShowtimesService.name);

  constructor(
    @InjectRepository(Showtime)
    private readonly showtimeRepository: Repository<Showtime>,
    private readonly dataSource: DataSource,
    private readonly moviesService: MoviesService,
    private readonly seatsService: SeatsService,
  ) {}

  async create(dto: CreateShowtimeDto): Promise<Showtime> {
    const window: TimeWindow = { start: new Date(dto.startTime), end: new Date(dto.endTime) };
    assertValidWindow(window);

    const movie = await this.moviesService.findById(dto.movieId);

    try {
      const showtime = await executeInTransaction(this.dataSource, async (manager) => {
        // Scheduling in a room is serialized on the room row.
        const room = await this.lockRoom(manager, dto.roomId);
        if (!room.active) {
          throw new BadRequestException(`Room with ID ${room.id} is not active`);
        }

        await this.assertNoOverlap(manager, room.id, window);

        const created = manager.create(Showtime, {
          startTime: window.start,
          endTime: window.end,
          basePrice: dto.basePrice,
          status: ShowtimeStatus.SCHEDULED,
          movieId: movie.id,
          roomId: room.id,
        });
        const saved = await manager.save(created);

        await this.seatsService.generateSeatPool(manager, saved.id, room);

        saved.room = room;
        return saved;
      });

      showtime.movie = movie;

      this.logger.log(
        `Showtime created: ${showtime.id} in room ${showtime.roomId} with ${
          showtime.room.rows * showtime.room.seatsPerRow
        } seats`,
      );

      return showtime;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(OVERLAP_MESSAGE);
      }
      throw error;
    }
  }

  async search(query: SearchShowtimesDto): Promise<[Showtime[], number]> {
    const where: FindOptionsWhere<Showtime> = {};

    if (query.date) {
      const day = utcDayWindow(query.date);
      where.startTime = And(MoreThanOrEqual(day.start), LessThan(day.end));
    }
    if (query.roomId !== undefined) {
      where.roomId = query.roomId;
    }
    if (query.movieId !== undefined) {
      where.movieId = query.movieId;
    }
    if (query.status) {
      where.status = query.status;
    }

    return this.showtimeRepository.findAndCount({
      where,
      relations: ['movie', 'room'],
      order: { startTime: 'ASC' },
      ...toSkipTake(query),
    });
  }

  async findById(id: number): Promise<Showtime> {
    const showtime = await this.showtimeRepository.findOne({
      where: { id },
      relations: ['movie', 'room'],
    });

    if (!showtime) {
      throw new NotFoundException(`Showtime with ID ${id} not found`);
    }

    return showtime;
  }

  async update(id: number, dto: UpdateShowtimeDto): Promise<Showtime> {
    const window: TimeWindow = { start: new Date(dto.startTime), end: new Date(dto.endTime) };
    assertValidWindow(window);

    try {
      await executeInTransaction(this.dataSource, async (manager) => {
        const showtime = await this.lockShowtime(manager, id);

        if (showtimeStateMachine.isTerminal(showtime.status)) {
          throw new UnprocessableEntityException({
            message: `Showtime ${id} is ${showtime.status.toLowerCase()} and cannot be rescheduled`,
            error: 'Illegal Status',
          });
        }

        await this.lockRoom(manager, showtime.roomId);
        await this.assertNoOverlap(manager, showtime.roomId, window, id);

        showtime.startTime = window.start;
        showtime.endTime = window.end;
        showtime.basePrice = dto.basePrice;
        await manager.save(showtime);
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(OVERLAP_MESSAGE);
      }
      throw error;
    }

    this.logger.log(`Showtime rescheduled: ${id}`);
    return this.findById(id);
  }

  async cancel(id: number): Promise<Showtime> {
    await executeInTransaction(this.dataSource, async (manager) => {
      const showtime = await this.lockShowtime(manager, id);
      transitionShowtime(showtime, ShowtimeStatus.CANCELLED);
      await manager.save(showtime);
    });

    this.logger.log(`Showtime cancelled: ${id}`);
    return this.findById(id);
  }

  async remove(id: number): Promise<void> {
    await executeInTransaction(this.dataSource, async (manager) => {
      const showtime = await this.lockShowtime(manager, id);

      const issuedTickets = await manager
        .createQueryBuilder(Ticket, 'ticket')
        .innerJoin('ticket.seat', 'seat')
        .where('seat.showtime_id = :showtimeId', { showtimeId: id })
        .getCount();

      if (issuedTickets > 0) {
        throw new ConflictException(
          `Cannot delete showtime with ID ${id} because ${issuedTickets} ticket(s) were issued for it`,
        );
      }

      // seats go with it (ON DELETE CASCADE)
      await manager.remove(showtime);
    });

    this.logger.log(`Showtime deleted: ${id}`);
  }

  /**
   * Marks SCHEDULED showtimes that already ended as COMPLETED. Rows locked by another
   * worker are skipped and picked up on the next run.
   */
  async completeFinishedShowtimes(limit: number): Promise<number> {
    return executeInTransaction(this.dataSource, async (manager) => {
      const finished = await manager
        .createQueryBuilder(Showtime, 'showtime')
        .where('showtime.status = :status', { status: ShowtimeStatus.SCHEDULED })
        .andWhere('showtime.end_time < :now', { now: new Date() })
        .orderBy('showtime.end_time', 'ASC')
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .limit(limit)
        .getMany();

      if (finished.length === 0) {
        return 0;
      }

      for (const showtime of finished) {
        transitionShowtime(showtime, ShowtimeStatus.COMPLETED);
      }
      await manager.save(finished);

      return finished.length;
    });
  }

  private async lockRoom(manager: EntityManager, roomId: number): Promise<Room> {
    const room = await manager.findOne(Room, {
      where: { id: roomId },
      lock: { mode: 'pessimistic_write' },
    });

    if (!room) {
      throw new NotFoundException(`Room with ID ${roomId} not found`);
    }

    return room;
  }

  private async lockShowtime(manager: EntityManager, id: number): Promise<Showtime> {
    const showtime = await manager.findOne(Showtime, {
      where: { id },
      lock: { mode: 'pessimistic_write' },
    });

    if (!showtime) {
      throw new NotFoundException(`Showtime with ID ${id} not found`);
    }

    return showtime;
  }

  /**
   * Only SCHEDULED showtimes block a slot; the comparison is strict so touching
   * boundaries are allowed.
   */
  private async assertNoOverlap(
    manager: EntityManager,
    roomId: number,
    window: TimeWindow,
    excludeId?: number,
  ): Promise<void> {
    const query = manager
      .createQueryBuilder(Showtime, 'showtime')
      .where('showtime.room_id = :roomId', { roomId })
      .andWhere('showtime.status = :status', { status: ShowtimeStatus.SCHEDULED })
      .andWhere('showtime.start_time < :end', { end: window.end })
      .andWhere('showtime.end_time > :start', { start: window.start });

    if (excludeId !== undefined) {
      query.andWhere('showtime.id <> :excludeId', { excludeId });
    }

    const overlapping = await query.getCount();
    if (overlapping > 0) {
      throw new ConflictException(OVERLAP_MESSAGE);
    }
  }
}
