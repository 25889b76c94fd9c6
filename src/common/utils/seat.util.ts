import { SeatStatus } from '@modules/seats/entities/seat.entity';

interface SeatStatusCount {
  available: number;
  sold: number;
  total: number;
}

interface SeatWithStatus {
  status: SeatStatus;
}

interface SeatPosition {
  rowNumber: number;
  seatNumber: number;
}

export interface SeatRow<T> {
  row: number;
  seats: T[];
}

export function countSeatsByStatus(seats: SeatWithStatus[]): SeatStatusCount {
  const counts: SeatStatusCount = {
    available: 0,
    sold: 0,
    total: seats.length,
  };

  for (const seat of seats) {
    switch (seat.status) {
      case SeatStatus.AVAILABLE:
        counts.available++;
        break;
      case SeatStatus.SOLD:
        counts.sold++;
        break;
    }
  }

  return counts;
}

/** Groups seats by row number; rows and the seats inside them come back in ascending order. */
export function groupSeatsByRow<T extends SeatPosition>(seats: T[]): SeatRow<T>[] {
  const rows = new Map<number, T[]>();

  for (const seat of seats) {
    const row = rows.get(seat.rowNumber);
    if (row) {
      row.push(seat);
    } else {
      rows.set(seat.rowNumber, [seat]);
    }
  }

  return [...rows.entries()]
    .sort(([a], [b]) => a - b)
    .map(([row, rowSeats]) => ({
      row,
      seats: [...rowSeats].sort((a, b) => a.seatNumber - b.seatNumber),
    }));
}

export function occupancyPercentage(counts: SeatStatusCount): number {
  if (counts.total === 0) {
    return 0;
  }

  return Math.round((counts.sold * 10000) / counts.total) / 100;
}
