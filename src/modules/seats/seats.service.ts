import { Injectable, NotFoundException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Seat, SeatStatus } from './entities/seat.entity';
import { Showtime } from '@modules/showtimes/entities/showtime.entity';
import { Room } from '@modules/rooms/entities/room.entity';
import { SeatMapResponseDto } from './dto/seat-map-response.dto';
import { countSeatsByStatus, groupSeatsByRow, occupancyPercentage } from '@common/utils/seat.util';

const SEAT_INSERT_CHUNK = 500;

@Injectable()
export class SeatsService {
  private readonly logger = new Logger(SeatsService.name);

  constructor(
    @InjectRepository(Seat)
    private readonly seatRepository: Repository<Seat>,
    @InjectRepository(Showtime)
    private readonly showtimeRepository: Repository<Showtime>,
  ) {}

  /**
   * Materializes the seat pool of a new showtime from its room's grid. Runs on the
   * caller's transaction so the showtime and its seats commit or roll back together.
   */
  async generateSeatPool(
    manager: EntityManager,
    showtimeId: number,
    room: Pick<Room, 'rows' | 'seatsPerRow'>,
  ): Promise<Seat[]> {
    const seats: Seat[] = [];

    for (let rowNumber = 1; rowNumber <= room.rows; rowNumber++) {
      for (let seatNumber = 1; seatNumber <= room.seatsPerRow; seatNumber++) {
        seats.push(
          manager.create(Seat, {
            showtimeId,
            rowNumber,
            seatNumber,
            status: SeatStatus.AVAILABLE,
          }),
        );
      }
    }

    const saved = await manager.save(Seat, seats, { chunk: SEAT_INSERT_CHUNK });
    this.logger.debug(`Generated ${saved.length} seats for showtime ${showtimeId}`);
    return saved;
  }

  /** Lock-free read; availability may be momentarily stale while sales are in flight. */
  async getSeatMap(showtimeId: number): Promise<SeatMapResponseDto> {
    const showtimes = await this.showtimeRepository.countBy({ id: showtimeId });
    if (showtimes === 0) {
      throw new NotFoundException(`Showtime with ID ${showtimeId} not found`);
    }

    const seats = await this.seatRepository.find({
      where: { showtimeId },
      order: { rowNumber: 'ASC', seatNumber: 'ASC' },
    });

    const counts = countSeatsByStatus(seats);

    return {
      showtimeId,
      totalSeats: counts.total,
      availableSeats: counts.available,
      soldSeats: counts.sold,
      occupancyPercentage: occupancyPercentage(counts),
      rows: groupSeatsByRow(seats).map(({ row, seats: rowSeats }) => ({
        row,
        seats: rowSeats.map((seat) => ({
          id: seat.id,
          rowNumber: seat.rowNumber,
          seatNumber: seat.seatNumber,
          status: seat.status,
        })),
      })),
    };
  }
}
