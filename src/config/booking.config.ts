import { registerAs } from '@nestjs/config';

export const bookingConfig = registerAs('booking', () => ({
  lockTimeoutMs: parseInt(process.env.BOOKING_LOCK_TIMEOUT_MS ?? '5000', 10),
  scheduledShowtimesOnly: (process.env.BOOKING_SCHEDULED_SHOWTIMES_ONLY ?? 'true') !== 'false',
}));
