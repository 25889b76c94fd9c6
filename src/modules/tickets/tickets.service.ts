import {
  Injectable,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
  Logger,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Ticket, TicketStatus } from './entities/ticket.entity';
import { transitionTicket } from './ticket-status';
import { SellTicketsDto } from './dto/sell-tickets.dto';
import { Showtime, ShowtimeStatus } from '@modules/showtimes/entities/showtime.entity';
import { SeatStatus } from '@modules/seats/entities/seat.entity';
import { SeatLockService } from '@modules/seats/seat-lock.service';
import { transitionSeat } from '@modules/seats/seat-status';
import { executeInTransaction } from '@infrastructure/database/transaction.util';
import { isUniqueViolation } from '@common/utils/error.util';
import { sumAmounts } from '@common/utils/money.util';

export const SEATS_UNAVAILABLE_MESSAGE = 'At least one selected seat is not available';

export interface TicketSale {
  tickets: Ticket[];
  totalPrice: number;
}

@Injectable()
export class TicketsService {
  private readonly logger = new Logger(TicketsService.name);
  private readonly lockTimeoutMs: number;
  private readonly scheduledShowtimesOnly: boolean;

  constructor(
    @InjectRepository(Ticket)
    private readonly ticketRepository: Repository<Ticket>,
    private readonly dataSource: DataSource,
    private readonly seatLockService: SeatLockService,
    private readonly configService: ConfigService,
  ) {
    this.lockTimeoutMs = this.configService.get<number>('booking.lockTimeoutMs') ?? 5000;
    this.scheduledShowtimesOnly =
      this.configService.get<boolean>('booking.scheduledShowtimesOnly') ?? true;
  }

  /**
   * Sells every requested seat or none of them. The seats are locked in ascending id
   * order and only those still AVAILABLE come back; any shortfall (taken, unknown,
   * foreign or repeated ids) aborts the sale before anything is written.
   */
  async sell(dto: SellTicketsDto): Promise<TicketSale> {
    try {
      const sale = await executeInTransaction(
        this.dataSource,
        async (manager) => {
          const showtime = await manager.findOne(Showtime, {
            where: { id: dto.showtimeId },
            relations: ['movie'],
          });

          if (!showtime) {
            throw new NotFoundException(`Showtime with ID ${dto.showtimeId} not found`);
          }

          if (this.scheduledShowtimesOnly && showtime.status !== ShowtimeStatus.SCHEDULED) {
            throw new UnprocessableEntityException({
              message: `Showtime ${showtime.id} is ${showtime.status.toLowerCase()}, tickets cannot be sold`,
              error: 'Illegal Status',
            });
          }

          const seats = await this.seatLockService.lockAvailableSeats(
            manager,
            showtime.id,
            dto.seatIds,
          );

          if (seats.length !== dto.seatIds.length) {
            throw new ConflictException(SEATS_UNAVAILABLE_MESSAGE);
          }

          const purchasedAt = new Date();
          const customerName = dto.customerName.trim();

          const tickets = seats.map((seat) => {
            transitionSeat(seat, SeatStatus.SOLD);
            return manager.create(Ticket, {
              seatId: seat.id,
              price: showtime.basePrice,
              customerName,
              status: TicketStatus.ACTIVE,
              purchasedAt,
            });
          });

          await manager.save(seats);
          const savedTickets = await manager.save(tickets);

          savedTickets.forEach((ticket, index) => {
            ticket.seat = seats[index];
            ticket.seat.showtime = showtime;
          });

          return {
            tickets: savedTickets,
            totalPrice: sumAmounts(savedTickets.map((ticket) => ticket.price)),
          };
        },
        { lockTimeoutMs: this.lockTimeoutMs },
      );

      this.logger.log(
        `Sold ${sale.tickets.length} ticket(s) for showtime ${dto.showtimeId}: total ${sale.totalPrice}`,
      );

      return sale;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(SEATS_UNAVAILABLE_MESSAGE);
      }
      throw error;
    }
  }

  async findById(id: number): Promise<Ticket> {
    const ticket = await this.ticketRepository.findOne({
      where: { id },
      relations: ['seat', 'seat.showtime', 'seat.showtime.movie'],
    });

    if (!ticket) {
      throw new NotFoundException(`Ticket with ID ${id} not found`);
    }

    return ticket;
  }

  async cancel(id: number): Promise<void> {
    await executeInTransaction(
      this.dataSource,
      async (manager) => {
        const ticket = await this.lockTicket(manager, id);

        transitionTicket(ticket, TicketStatus.CANCELLED);
        transitionSeat(ticket.seat, SeatStatus.AVAILABLE);

        await manager.save(ticket.seat);
        await manager.save(ticket);
      },
      { lockTimeoutMs: this.lockTimeoutMs },
    );

    this.logger.log(`Ticket cancelled: ${id}`);
  }

  async consume(id: number): Promise<void> {
    await executeInTransaction(
      this.dataSource,
      async (manager) => {
        const ticket = await this.lockTicket(manager, id);

        transitionTicket(ticket, TicketStatus.CONSUMED);

        await manager.save(ticket);
      },
      { lockTimeoutMs: this.lockTimeoutMs },
    );

    this.logger.log(`Ticket consumed: ${id}`);
  }

  // Locks the ticket together with its seat so cancel and a concurrent sale of the
  // same seat serialize on the seat row.
  private async lockTicket(manager: EntityManager, id: number): Promise<Ticket> {
    const ticket = await manager
      .createQueryBuilder(Ticket, 'ticket')
      .innerJoinAndSelect('ticket.seat', 'seat')
      .where('ticket.id = :id', { id })
      .setLock('pessimistic_write')
      .getOne();

    if (!ticket) {
      throw new NotFoundException(`Ticket with ID ${id} not found`);
    }

    return ticket;
  }
}
