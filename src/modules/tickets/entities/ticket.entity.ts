import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Seat } from '@modules/seats/entities/seat.entity';
import { decimalTransformer } from '@common/utils/money.util';

export enum TicketStatus {
  ACTIVE = 'ACTIVE',
  CANCELLED = 'CANCELLED',
  CONSUMED = 'CONSUMED',
}

// A seat carries at most one live ticket; cancelled tickets stay in the ledger.
@Entity('tickets')
@Index('UQ_tickets_live_seat', ['seatId'], {
  unique: true,
  where: `"status" <> 'CANCELLED'`,
})
export class Ticket {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'seat_id', update: false })
  seatId!: number;

  @ManyToOne(() => Seat, { nullable: false })
  @JoinColumn({ name: 'seat_id' })
  seat!: Seat;

  @Column({ name: 'purchased_at', type: 'timestamptz', update: false })
  purchasedAt!: Date;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    update: false,
    transformer: decimalTransformer,
  })
  price!: number;

  @Column({ name: 'customer_name', length: 255 })
  customerName!: string;

  @Column({
    type: 'enum',
    enum: TicketStatus,
    enumName: 'ticket_status_enum',
    default: TicketStatus.ACTIVE,
  })
  status!: TicketStatus;
}
