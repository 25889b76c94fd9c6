import { createStateMachine } from '@common/utils/state-machine.util';
import { Ticket, TicketStatus } from './entities/ticket.entity';

export const ticketStateMachine = createStateMachine<TicketStatus>('Ticket', {
  [TicketStatus.ACTIVE]: [TicketStatus.CANCELLED, TicketStatus.CONSUMED],
  [TicketStatus.CANCELLED]: [],
  [TicketStatus.CONSUMED]: [],
});

const ACTION_BY_TARGET: Record<TicketStatus, string> = {
  [TicketStatus.ACTIVE]: 'reactivated',
  [TicketStatus.CANCELLED]: 'cancelled',
  [TicketStatus.CONSUMED]: 'consumed',
};

export function transitionTicket(ticket: Ticket, to: TicketStatus): Ticket {
  ticketStateMachine.assertTransition(
    ticket.status,
    to,
    `A non active ticket cannot be ${ACTION_BY_TARGET[to]}`,
  );
  ticket.status = to;
  return ticket;
}
