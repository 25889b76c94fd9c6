import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Showtime } from './entities/showtime.entity';
import { ShowtimesController } from './showtimes.controller';
import { ShowtimesService } from './showtimes.service';
import { ShowtimeCompletionJob } from './jobs/showtime-completion.job';
import { MoviesModule } from '@modules/movies/movies.module';
import { SeatsModule } from '@modules/seats/seats.module';

@Module({
  imports: [TypeOrmModule.forFeature([Showtime]), MoviesModule, SeatsModule],
  controllers: [ShowtimesController],
  providers: [ShowtimesService, ShowtimeCompletionJob],
  exports: [ShowtimesService],
})
export class ShowtimesModule {}
