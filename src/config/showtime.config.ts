import { registerAs } from '@nestjs/config';

export const showtimeConfig = registerAs('showtimes', () => ({
  completionBatchLimit: parseInt(process.env.SHOWTIME_COMPLETION_BATCH_LIMIT ?? '100', 10),
}));
