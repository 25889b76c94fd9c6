import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Movie } from '@modules/movies/entities/movie.entity';
import { Room } from '@modules/rooms/entities/room.entity';
import { decimalTransformer } from '@common/utils/money.util';

export enum ShowtimeStatus {
  SCHEDULED = 'SCHEDULED',
  COMPLETED = 'COMPLETED',
  CANCELLED = 'CANCELLED',
}

@Entity('showtimes')
@Index('UQ_showtimes_room_start_scheduled', ['roomId', 'startTime'], {
  unique: true,
  where: `"status" = 'SCHEDULED'`,
})
export class Showtime {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'start_time', type: 'timestamptz' })
  startTime!: Date;

  @Column({ name: 'end_time', type: 'timestamptz' })
  endTime!: Date;

  @Column({
    name: 'base_price',
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer,
  })
  basePrice!: number;

  @Column({
    type: 'enum',
    enum: ShowtimeStatus,
    enumName: 'showtime_status_enum',
    default: ShowtimeStatus.SCHEDULED,
  })
  status!: ShowtimeStatus;

  @Column({ name: 'movie_id' })
  movieId!: number;

  @ManyToOne(() => Movie, { nullable: false })
  @JoinColumn({ name: 'movie_id' })
  movie!: Movie;

  @Column({ name: 'room_id' })
  roomId!: number;

  @ManyToOne(() => Room, { nullable: false })
  @JoinColumn({ name: 'room_id' })
  room!: Room;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
