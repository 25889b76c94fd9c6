import { PickType } from '@nestjs/swagger';
import { CreateShowtimeDto } from './create-showtime.dto';

export class UpdateShowtimeDto extends PickType(CreateShowtimeDto, [
  'startTime',
  'endTime',
  'basePrice',
] as const) {}
