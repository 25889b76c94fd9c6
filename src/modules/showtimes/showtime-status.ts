import { createStateMachine } from '@common/utils/state-machine.util';
import { Showtime, ShowtimeStatus } from './entities/showtime.entity';

export const showtimeStateMachine = createStateMachine<ShowtimeStatus>('Showtime', {
  [ShowtimeStatus.SCHEDULED]: [ShowtimeStatus.COMPLETED, ShowtimeStatus.CANCELLED],
  [ShowtimeStatus.COMPLETED]: [],
  [ShowtimeStatus.CANCELLED]: [],
});

export function transitionShowtime(showtime: Showtime, to: ShowtimeStatus): Showtime {
  showtimeStateMachine.assertTransition(
    showtime.status,
    to,
    `Showtime ${showtime.id} is ${showtime.status.toLowerCase()} and cannot become ${to.toLowerCase()}`,
  );
  showtime.status = to;
  return showtime;
}
