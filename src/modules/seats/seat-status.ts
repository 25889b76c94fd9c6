import { createStateMachine } from '@common/utils/state-machine.util';
import { Seat, SeatStatus } from './entities/seat.entity';

export const seatStateMachine = createStateMachine<SeatStatus>('Seat', {
  [SeatStatus.AVAILABLE]: [SeatStatus.SOLD],
  [SeatStatus.SOLD]: [SeatStatus.AVAILABLE],
});

export function transitionSeat(seat: Seat, to: SeatStatus): Seat {
  seatStateMachine.assertTransition(
    seat.status,
    to,
    `Seat ${seat.id} cannot transition from ${seat.status} to ${to}`,
  );
  seat.status = to;
  return seat;
}
