import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsString, Length, Max, Min } from 'class-validator';

export class CreateRoomDto {
  @ApiProperty({ example: 'Room 1', description: 'Unique room name' })
  @IsString()
  @Length(1, 255)
  name!: string;

  @ApiProperty({ example: 10, description: 'Number of seat rows' })
  @IsInt()
  @Min(1)
  @Max(100)
  rows!: number;

  @ApiProperty({ example: 12, description: 'Seats in each row' })
  @IsInt()
  @Min(1)
  @Max(100)
  seatsPerRow!: number;
}
