import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Ticket } from './entities/ticket.entity';
import { TicketsController } from './tickets.controller';
import { TicketsService } from './tickets.service';
import { SeatsModule } from '@modules/seats/seats.module';

@Module({
  imports: [TypeOrmModule.forFeature([Ticket]), SeatsModule],
  controllers: [TicketsController],
  providers: [TicketsService],
})
export class TicketsModule {}
