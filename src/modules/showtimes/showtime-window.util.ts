import { BadRequestException } from '@nestjs/common';

export interface TimeWindow {
  start: Date;
  end: Date;
}

export function assertValidWindow(window: TimeWindow): void {
  if (Number.isNaN(window.start.getTime()) || Number.isNaN(window.end.getTime())) {
    throw new BadRequestException('Start and end time must be valid dates');
  }

  if (window.start.getTime() >= window.end.getTime()) {
    throw new BadRequestException('Start time must be before end time');
  }
}

export function utcDayWindow(date: string): TimeWindow {
  const start = new Date(`${date.slice(0, 10)}T00:00:00.000Z`);
  const end = new Date(start.getTime() + 24 * 60 * 60 * 1000);
  return { start, end };
}
