import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ShowtimesService } from '../showtimes.service';
import { errorMessage } from '@common/utils/error.util';

@Injectable()
export class ShowtimeCompletionJob {
  private readonly logger = new Logger(ShowtimeCompletionJob.name);
  private isProcessing = false;

  constructor(
    private readonly showtimesService: ShowtimesService,
    private readonly configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async handle(): Promise<void> {
    if (this.isProcessing) {
      this.logger.debug('Completion job already running, skipping...');
      return;
    }

    this.isProcessing = true;

    try {
      const limit = this.configService.get<number>('showtimes.completionBatchLimit', 100);
      const completedCount = await this.showtimesService.completeFinishedShowtimes(limit);

      if (completedCount > 0) {
        this.logger.log(`Completed ${completedCount} showtime(s)`);
      }
    } catch (error) {
      this.logger.error(`Error completing showtimes: ${errorMessage(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }
}
