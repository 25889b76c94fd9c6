import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { MAX_ID } from '@common/pipes/parse-id.pipe';

export class SellTicketsDto {
  @ApiProperty({ example: 1, description: 'Showtime ID' })
  @IsInt()
  @Min(1)
  @Max(MAX_ID)
  showtimeId!: number;

  @ApiProperty({ example: [12, 13], description: 'Seats to buy, all from the same showtime' })
  @IsArray()
  @ArrayMinSize(1)
  @IsInt({ each: true })
  @Min(1, { each: true })
  @Max(MAX_ID, { each: true })
  seatIds!: number[];

  @ApiProperty({ example: 'Jane Doe', description: 'Name printed on every ticket' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  customerName!: string;
}
