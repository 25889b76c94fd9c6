import { UnprocessableEntityException } from '@nestjs/common';

export type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>;

export interface StateMachine<S extends string> {
  canTransition(from: S, to: S): boolean;
  isTerminal(state: S): boolean;
  /** Throws an "Illegal Status" 422 when `from -> to` is not in the table. */
  assertTransition(from: S, to: S, message?: string): void;
}

export function createStateMachine<S extends string>(
  entityName: string,
  transitions: TransitionTable<S>,
): StateMachine<S> {
  const canTransition = (from: S, to: S): boolean => transitions[from].includes(to);

  return {
    canTransition,
    isTerminal: (state: S) => transitions[state].length === 0,
    assertTransition: (from: S, to: S, message?: string) => {
      if (!canTransition(from, to)) {
        throw new UnprocessableEntityException({
          message: message ?? `${entityName} cannot transition from ${from} to ${to}`,
          error: 'Illegal Status',
        });
      }
    },
  };
}
