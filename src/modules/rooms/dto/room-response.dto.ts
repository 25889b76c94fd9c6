import { ApiProperty } from '@nestjs/swagger';

export class RoomResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  rows!: number;

  @ApiProperty()
  seatsPerRow!: number;

  @ApiProperty()
  capacity!: number;

  @ApiProperty()
  active!: boolean;
}
