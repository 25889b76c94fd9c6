import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { WinstonModule } from 'nest-winston';

import { createWinstonOptions } from './infrastructure/logger/logger.config';
import { appConfig } from './config/app.config';
import { databaseConfig } from './config/database.config';
import { bookingConfig } from './config/booking.config';
import { showtimeConfig } from './config/showtime.config';
import { HealthController } from './health/health.controller';
import { MoviesModule } from './modules/movies/movies.module';
import { RoomsModule } from './modules/rooms/rooms.module';
import { SeatsModule } from './modules/seats/seats.module';
import { ShowtimesModule } from './modules/showtimes/showtimes.module';
import { TicketsModule } from './modules/tickets/tickets.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [appConfig, databaseConfig, bookingConfig, showtimeConfig],
    }),

    WinstonModule.forRootAsync({
      useFactory: (configService: ConfigService) =>
        createWinstonOptions({
          nodeEnv: configService.get<string>('app.nodeEnv') ?? 'development',
          level: configService.get<string>('app.logLevel'),
          logDir: configService.get<string>('app.logDir'),
        }),
      inject: [ConfigService],
    }),

    ScheduleModule.forRoot(),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.user'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.name'),
        autoLoadEntities: true,
        synchronize: false,
        migrationsRun: true,
        migrations: [`${__dirname}/infrastructure/database/migrations/*.js`],
        extra: { max: configService.get<number>('database.poolSize') },
        logging: configService.get<string>('app.nodeEnv') === 'development',
      }),
      inject: [ConfigService],
    }),

    MoviesModule,
    RoomsModule,
    SeatsModule,
    ShowtimesModule,
    TicketsModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
