import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Seat } from './entities/seat.entity';
import { Showtime } from '@modules/showtimes/entities/showtime.entity';
import { SeatsController } from './seats.controller';
import { SeatsService } from './seats.service';
import { SeatLockService } from './seat-lock.service';

@Module({
  imports: [TypeOrmModule.forFeature([Seat, Showtime])],
  controllers: [SeatsController],
  providers: [SeatsService, SeatLockService],
  exports: [SeatsService, SeatLockService],
})
export class SeatsModule {}
