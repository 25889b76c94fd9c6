import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { Seat, SeatStatus } from './entities/seat.entity';

/**
 * Exclusive hold over a candidate set of seats for the lifetime of the caller's
 * transaction.
 *
 * Seats are selected `FOR UPDATE` in ascending id order, so two purchases racing over
 * overlapping sets queue on the first shared seat instead of deadlocking. A purchase
 * that waited on a seat re-checks the AVAILABLE predicate once the holder commits and
 * no longer sees a seat the holder sold.
 */
@Injectable()
export class SeatLockService {
  private readonly logger = new Logger(SeatLockService.name);

  /**
   * Returns the subset of `seatIds` that belongs to `showtimeId` and is AVAILABLE,
   * locked until `manager`'s transaction ends. Unknown, foreign and repeated ids simply
   * do not appear in the result.
   */
  async lockAvailableSeats(
    manager: EntityManager,
    showtimeId: number,
    seatIds: number[],
  ): Promise<Seat[]> {
    const ids = [...new Set(seatIds)].sort((a, b) => a - b);
    if (ids.length === 0) {
      return [];
    }

    const seats = await manager
      .createQueryBuilder(Seat, 'seat')
      .where('seat.id IN (:...ids)', { ids })
      .andWhere('seat.showtime_id = :showtimeId', { showtimeId })
      .andWhere('seat.status = :status', { status: SeatStatus.AVAILABLE })
      .orderBy('seat.id', 'ASC')
      .setLock('pessimistic_write')
      .getMany();

    this.logger.debug(
      `Locked ${seats.length}/${ids.length} seats for showtime ${showtimeId}: ${seats
        .map((seat) => seat.id)
        .join(', ')}`,
    );

    return seats;
  }
}
