import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import {
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { TicketsService, SEATS_UNAVAILABLE_MESSAGE } from '@modules/tickets/tickets.service';
import { Ticket, TicketStatus } from '@modules/tickets/entities/ticket.entity';
import { Showtime, ShowtimeStatus } from '@modules/showtimes/entities/showtime.entity';
import { Movie } from '@modules/movies/entities/movie.entity';
import { Seat, SeatStatus } from '@modules/seats/entities/seat.entity';
import { SeatLockService } from '@modules/seats/seat-lock.service';
import { InMemoryTicketing } from './in-memory-ticketing';

type BookingSettings = Record<string, unknown>;

const defaultSettings: BookingSettings = {
  'booking.lockTimeoutMs': 5000,
  'booking.scheduledShowtimesOnly': true,
};

const buildShowtime = (overrides: Partial<Showtime> = {}): Showtime =>
  Object.assign(
    new Showtime(),
    {
      id: 100,
      startTime: new Date('2026-11-02T19:00:00.000Z'),
      endTime: new Date('2026-11-02T21:00:00.000Z'),
      basePrice: 10,
      status: ShowtimeStatus.SCHEDULED,
      movieId: 1,
      roomId: 1,
      movie: Object.assign(new Movie(), { id: 1, title: 'Test Movie' }),
    },
    overrides,
  );

const buildSeat = (id: number, seatNumber: number): Seat =>
  Object.assign(new Seat(), {
    id,
    showtimeId: 100,
    rowNumber: 1,
    seatNumber,
    status: SeatStatus.AVAILABLE,
  });

async function createService(
  dataSource: object,
  seatLockService: object,
  settings: BookingSettings = defaultSettings,
  ticketRepository: object = { findOne: jest.fn() },
): Promise<TicketsService> {
  const module = await Test.createTestingModule({
    providers: [
      TicketsService,
      { provide: getRepositoryToken(Ticket), useValue: ticketRepository },
      { provide: DataSource, useValue: dataSource },
      { provide: SeatLockService, useValue: seatLockService },
      { provide: ConfigService, useValue: { get: jest.fn((key: string) => settings[key]) } },
    ],
  }).compile();

  return module.get<TicketsService>(TicketsService);
}

describe('TicketsService', () => {
  describe('with mocked transaction', () => {
    let service: TicketsService;

    const mockTicketRepository = {
      findOne: jest.fn(),
    };

    const mockSeatLockService = {
      lockAvailableSeats: jest.fn(),
    };

    const mockQueryRunner = {
      connect: jest.fn(),
      startTransaction: jest.fn(),
      commitTransaction: jest.fn(),
      rollbackTransaction: jest.fn(),
      release: jest.fn(),
      manager: {
        findOne: jest.fn(),
        create: jest.fn((_target: unknown, data: object) => ({ ...data })),
        save: jest.fn(),
        query: jest.fn(),
        createQueryBuilder: jest.fn(),
      },
    };

    const mockDataSource = {
      createQueryRunner: jest.fn().mockReturnValue(mockQueryRunner),
    };

    const sellDto = { showtimeId: 100, seatIds: [1, 2], customerName: 'Alice' };

    beforeEach(async () => {
      service = await createService(
        mockDataSource,
        mockSeatLockService,
        defaultSettings,
        mockTicketRepository,
      );

      jest.clearAllMocks();
    });

    describe('sell', () => {
      it('should bound lock waits before touching any row', async () => {
        mockQueryRunner.manager.findOne.mockResolvedValue(null);

        await expect(service.sell(sellDto)).rejects.toThrow(NotFoundException);

        expect(mockQueryRunner.startTransaction).toHaveBeenCalledWith('READ COMMITTED');
        expect(mockQueryRunner.manager.query).toHaveBeenCalledWith(
          'SET LOCAL lock_timeout = 5000',
        );
      });

      it('should keep a configured zero lock timeout', async () => {
        const unbounded = await createService(
          mockDataSource,
          mockSeatLockService,
          { 'booking.lockTimeoutMs': 0, 'booking.scheduledShowtimesOnly': true },
          mockTicketRepository,
        );
        mockQueryRunner.manager.query.mockClear();
        mockQueryRunner.manager.findOne.mockResolvedValue(null);

        await expect(unbounded.sell(sellDto)).rejects.toThrow(NotFoundException);

        expect(mockQueryRunner.manager.query).toHaveBeenCalledWith('SET LOCAL lock_timeout = 0');
      });

      it('should throw NotFoundException and lock nothing when showtime does not exist', async () => {
        mockQueryRunner.manager.findOne.mockResolvedValue(null);

        await expect(service.sell(sellDto)).rejects.toThrow(
          'Showtime with ID 100 not found',
        );
        expect(mockSeatLockService.lockAvailableSeats).not.toHaveBeenCalled();
        expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
        expect(mockQueryRunner.release).toHaveBeenCalled();
      });

      it.each([ShowtimeStatus.CANCELLED, ShowtimeStatus.COMPLETED])(
        'should refuse to sell seats of a %s showtime',
        async (status) => {
          mockQueryRunner.manager.findOne.mockResolvedValue(buildShowtime({ status }));

          await expect(service.sell(sellDto)).rejects.toThrow(UnprocessableEntityException);
          expect(mockSeatLockService.lockAvailableSeats).not.toHaveBeenCalled();
          expect(mockQueryRunner.manager.save).not.toHaveBeenCalled();
        },
      );

      it('should lock the requested seats of the showtime on the transaction manager', async () => {
        mockQueryRunner.manager.findOne.mockResolvedValue(buildShowtime());
        mockSeatLockService.lockAvailableSeats.mockResolvedValue([buildSeat(1, 1)]);

        await expect(service.sell(sellDto)).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);

        expect(mockSeatLockService.lockAvailableSeats).toHaveBeenCalledWith(
          mockQueryRunner.manager,
          100,
          [1, 2],
        );
        expect(mockQueryRunner.manager.save).not.toHaveBeenCalled();
        expect(mockQueryRunner.commitTransaction).not.toHaveBeenCalled();
      });

      it('should translate a live-ticket unique violation into a seat conflict', async () => {
        mockQueryRunner.manager.findOne.mockResolvedValue(buildShowtime());
        mockSeatLockService.lockAvailableSeats.mockResolvedValue([
          buildSeat(1, 1),
          buildSeat(2, 2),
        ]);
        mockQueryRunner.manager.save
          .mockResolvedValueOnce([])
          .mockRejectedValueOnce({ code: '23505', constraint: 'UQ_tickets_live_seat' });

        const sale = service.sell(sellDto);

        await expect(sale).rejects.toThrow(ConflictException);
        await expect(sale).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);
        expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
      });

      it('should roll back and rethrow storage failures', async () => {
        mockQueryRunner.manager.findOne.mockResolvedValue(buildShowtime());
        mockSeatLockService.lockAvailableSeats.mockResolvedValue([
          buildSeat(1, 1),
          buildSeat(2, 2),
        ]);
        mockQueryRunner.manager.save.mockRejectedValueOnce(new Error('connection reset'));

        await expect(service.sell(sellDto)).rejects.toThrow('connection reset');
        expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
        expect(mockQueryRunner.commitTransaction).not.toHaveBeenCalled();
      });
    });

    describe('findById', () => {
      it('should load the ticket with seat, showtime and movie', async () => {
        const ticket = Object.assign(new Ticket(), { id: 7 });
        mockTicketRepository.findOne.mockResolvedValue(ticket);

        const result = await service.findById(7);

        expect(result).toBe(ticket);
        expect(mockTicketRepository.findOne).toHaveBeenCalledWith({
          where: { id: 7 },
          relations: ['seat', 'seat.showtime', 'seat.showtime.movie'],
        });
      });

      it('should throw NotFoundException when ticket does not exist', async () => {
        mockTicketRepository.findOne.mockResolvedValue(null);

        await expect(service.findById(7)).rejects.toThrow('Ticket with ID 7 not found');
      });
    });

    describe('cancel', () => {
      it('should throw NotFoundException when ticket does not exist', async () => {
        const mockQueryBuilder = {
          innerJoinAndSelect: jest.fn().mockReturnThis(),
          where: jest.fn().mockReturnThis(),
          setLock: jest.fn().mockReturnThis(),
          getOne: jest.fn().mockResolvedValue(null),
        };
        mockQueryRunner.manager.createQueryBuilder.mockReturnValue(mockQueryBuilder);

        await expect(service.cancel(9)).rejects.toThrow(NotFoundException);
        expect(mockQueryBuilder.innerJoinAndSelect).toHaveBeenCalledWith('ticket.seat', 'seat');
        expect(mockQueryBuilder.setLock).toHaveBeenCalledWith('pessimistic_write');
        expect(mockQueryRunner.manager.save).not.toHaveBeenCalled();
      });
    });

    describe('consume', () => {
      it('should throw NotFoundException when ticket does not exist', async () => {
        const mockQueryBuilder = {
          innerJoinAndSelect: jest.fn().mockReturnThis(),
          where: jest.fn().mockReturnThis(),
          setLock: jest.fn().mockReturnThis(),
          getOne: jest.fn().mockResolvedValue(null),
        };
        mockQueryRunner.manager.createQueryBuilder.mockReturnValue(mockQueryBuilder);

        await expect(service.consume(9)).rejects.toThrow('Ticket with ID 9 not found');
        expect(mockQueryBuilder.where).toHaveBeenCalledWith('ticket.id = :id', { id: 9 });
        expect(mockQueryRunner.manager.save).not.toHaveBeenCalled();
        expect(mockQueryRunner.rollbackTransaction).toHaveBeenCalled();
      });
    });
  });

  describe('against the in-memory seat store', () => {
    let store: InMemoryTicketing;
    let service: TicketsService;

    const setup = async (
      showtime: Showtime = buildShowtime(),
      settings: BookingSettings = defaultSettings,
    ): Promise<void> => {
      store = new InMemoryTicketing(showtime);
      store.addSeat(1, 1, 1);
      store.addSeat(2, 1, 2);
      store.addSeat(3, 1, 3);
      store.addSeat(4, 1, 1, 200);
      service = await createService(store.dataSource, store.seatLockService, settings);
    };

    beforeEach(async () => {
      await setup();
    });

    it('should sell the requested seats and leave the rest available', async () => {
      const sale = await service.sell({ showtimeId: 100, seatIds: [1, 2], customerName: ' Alice ' });

      expect(sale.totalPrice).toBe(20);
      expect(sale.tickets).toHaveLength(2);
      expect(sale.tickets.map((ticket) => ticket.seat.seatNumber)).toEqual([1, 2]);
      expect(sale.tickets.map((ticket) => ticket.customerName)).toEqual(['Alice', 'Alice']);
      expect(sale.tickets.map((ticket) => ticket.status)).toEqual([
        TicketStatus.ACTIVE,
        TicketStatus.ACTIVE,
      ]);
      expect(sale.tickets[0].seat.showtime.movie.title).toBe('Test Movie');
      expect(sale.tickets[0].purchasedAt).toBeInstanceOf(Date);
      expect(sale.tickets[1].purchasedAt).toBe(sale.tickets[0].purchasedAt);

      expect(store.seatStatus(1)).toBe(SeatStatus.SOLD);
      expect(store.seatStatus(2)).toBe(SeatStatus.SOLD);
      expect(store.seatStatus(3)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(2);
    });

    it('should let exactly one of two concurrent sales of the same seat succeed', async () => {
      const results = await Promise.allSettled([
        service.sell({ showtimeId: 100, seatIds: [3], customerName: 'Alice' }),
        service.sell({ showtimeId: 100, seatIds: [3], customerName: 'Bob' }),
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected',
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictException);
      expect(store.seatStatus(3)).toBe(SeatStatus.SOLD);
      expect(store.ticketsForSeat(3)).toHaveLength(1);
    });

    it('should let exactly one of many concurrent sales of the same seat succeed', async () => {
      const buyers = ['Alice', 'Bob', 'Carol', 'Dave', 'Erin'];

      const results = await Promise.allSettled(
        buyers.map((customerName) =>
          service.sell({ showtimeId: 100, seatIds: [3], customerName }),
        ),
      );

      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected',
      );

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      expect(rejected).toHaveLength(buyers.length - 1);
      rejected.forEach((result) => expect(result.reason).toBeInstanceOf(ConflictException));
      expect(store.ticketsForSeat(3)).toHaveLength(1);
      expect(store.seatStatus(3)).toBe(SeatStatus.SOLD);
      expect(store.rollbacks).toBe(buyers.length - 1);
    });

    it('should keep overlapping concurrent sales all-or-nothing', async () => {
      const results = await Promise.allSettled([
        service.sell({ showtimeId: 100, seatIds: [1, 2], customerName: 'Alice' }),
        service.sell({ showtimeId: 100, seatIds: [3, 2], customerName: 'Bob' }),
      ]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
      expect(store.seatStatus(1)).toBe(SeatStatus.SOLD);
      expect(store.seatStatus(2)).toBe(SeatStatus.SOLD);
      expect(store.seatStatus(3)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(2);
    });

    it('should fail the whole sale when one seat does not exist', async () => {
      await expect(
        service.sell({ showtimeId: 100, seatIds: [1, 2, 99], customerName: 'Alice' }),
      ).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);

      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
      expect(store.seatStatus(2)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(0);
    });

    it('should not leak a partial sale when one seat is already sold', async () => {
      await service.sell({ showtimeId: 100, seatIds: [2], customerName: 'Alice' });

      await expect(
        service.sell({ showtimeId: 100, seatIds: [1, 2, 3], customerName: 'Bob' }),
      ).rejects.toThrow(ConflictException);

      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
      expect(store.seatStatus(3)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(1);
    });

    it('should fail the same way on every retry without side effects', async () => {
      await service.sell({ showtimeId: 100, seatIds: [2], customerName: 'Alice' });

      for (let attempt = 0; attempt < 3; attempt++) {
        await expect(
          service.sell({ showtimeId: 100, seatIds: [1, 2], customerName: 'Bob' }),
        ).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);
      }

      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(1);
      expect(store.rollbacks).toBe(3);
    });

    it('should reject a request that repeats a seat id', async () => {
      await expect(
        service.sell({ showtimeId: 100, seatIds: [1, 1], customerName: 'Alice' }),
      ).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);

      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
      expect(store.tickets.size).toBe(0);
    });

    it('should not sell a seat that belongs to another showtime', async () => {
      await expect(
        service.sell({ showtimeId: 100, seatIds: [1, 4], customerName: 'Alice' }),
      ).rejects.toThrow(SEATS_UNAVAILABLE_MESSAGE);

      expect(store.seatStatus(4)).toBe(SeatStatus.AVAILABLE);
      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
    });

    it('should charge exactly the base price for every seat', async () => {
      await setup(buildShowtime({ basePrice: 12.35 }));

      const sale = await service.sell({
        showtimeId: 100,
        seatIds: [1, 2, 3],
        customerName: 'Alice',
      });

      expect(sale.tickets.map((ticket) => ticket.price)).toEqual([12.35, 12.35, 12.35]);
      expect(sale.totalPrice).toBe(37.05);
    });

    it('should sell for a finished showtime when the scheduled-only guard is off', async () => {
      await setup(buildShowtime({ status: ShowtimeStatus.COMPLETED }), {
        'booking.lockTimeoutMs': 5000,
        'booking.scheduledShowtimesOnly': false,
      });

      const sale = await service.sell({ showtimeId: 100, seatIds: [1], customerName: 'Alice' });

      expect(sale.tickets).toHaveLength(1);
      expect(store.seatStatus(1)).toBe(SeatStatus.SOLD);
    });

    it('should release the seat on cancel so it can be sold again', async () => {
      const sale = await service.sell({ showtimeId: 100, seatIds: [1, 2], customerName: 'Alice' });
      const ticketForSeatTwo = sale.tickets[1];

      await service.cancel(ticketForSeatTwo.id);

      expect(store.tickets.get(ticketForSeatTwo.id)?.status).toBe(TicketStatus.CANCELLED);
      expect(store.seatStatus(2)).toBe(SeatStatus.AVAILABLE);

      const resale = await service.sell({ showtimeId: 100, seatIds: [2], customerName: 'Bob' });

      expect(resale.tickets[0].customerName).toBe('Bob');
      expect(store.seatStatus(2)).toBe(SeatStatus.SOLD);
      expect(store.ticketsForSeat(2).map((ticket) => ticket.status)).toEqual([
        TicketStatus.CANCELLED,
        TicketStatus.ACTIVE,
      ]);
    });

    it('should keep the seat sold when a consumed ticket is cancelled', async () => {
      const sale = await service.sell({ showtimeId: 100, seatIds: [3], customerName: 'Alice' });
      const ticketId = sale.tickets[0].id;

      await service.consume(ticketId);

      expect(store.tickets.get(ticketId)?.status).toBe(TicketStatus.CONSUMED);
      expect(store.seatStatus(3)).toBe(SeatStatus.SOLD);

      await expect(service.cancel(ticketId)).rejects.toThrow(
        'A non active ticket cannot be cancelled',
      );
      expect(store.tickets.get(ticketId)?.status).toBe(TicketStatus.CONSUMED);
      expect(store.seatStatus(3)).toBe(SeatStatus.SOLD);
    });

    it('should refuse to consume a ticket twice', async () => {
      const sale = await service.sell({ showtimeId: 100, seatIds: [2], customerName: 'Alice' });
      const ticketId = sale.tickets[0].id;
      await service.consume(ticketId);

      await expect(service.consume(ticketId)).rejects.toThrow(UnprocessableEntityException);
      await expect(service.consume(ticketId)).rejects.toThrow(
        'A non active ticket cannot be consumed',
      );
      expect(store.tickets.get(ticketId)?.status).toBe(TicketStatus.CONSUMED);
      expect(store.seatStatus(2)).toBe(SeatStatus.SOLD);
    });

    it('should throw NotFoundException when consuming an unknown ticket', async () => {
      await expect(service.consume(999)).rejects.toThrow(NotFoundException);
      expect(store.tickets.size).toBe(0);
    });

    it('should refuse to cancel or consume a cancelled ticket', async () => {
      const sale = await service.sell({ showtimeId: 100, seatIds: [1], customerName: 'Alice' });
      const ticketId = sale.tickets[0].id;
      await service.cancel(ticketId);

      await expect(service.cancel(ticketId)).rejects.toThrow(UnprocessableEntityException);
      await expect(service.consume(ticketId)).rejects.toThrow(
        'A non active ticket cannot be consumed',
      );
      expect(store.tickets.get(ticketId)?.status).toBe(TicketStatus.CANCELLED);
      expect(store.seatStatus(1)).toBe(SeatStatus.AVAILABLE);
    });
  });
});
