import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Showtime } from '@modules/showtimes/entities/showtime.entity';

export enum SeatStatus {
  AVAILABLE = 'AVAILABLE',
  SOLD = 'SOLD',
}

@Entity('seats')
@Unique('UQ_seats_showtime_row_seat', ['showtimeId', 'rowNumber', 'seatNumber'])
export class Seat {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'showtime_id' })
  showtimeId!: number;

  @ManyToOne(() => Showtime, { onDelete: 'CASCADE', nullable: false })
  @JoinColumn({ name: 'showtime_id' })
  showtime!: Showtime;

  @Column({ name: 'row_number', type: 'int' })
  rowNumber!: number;

  @Column({ name: 'seat_number', type: 'int' })
  seatNumber!: number;

  @Column({
    type: 'enum',
    enum: SeatStatus,
    enumName: 'seat_status_enum',
    default: SeatStatus.AVAILABLE,
  })
  status!: SeatStatus;
}
