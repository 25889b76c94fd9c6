import { ApiProperty } from '@nestjs/swagger';

export class MovieResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  durationMinutes!: number;

  @ApiProperty()
  genre!: string;

  @ApiProperty()
  releaseDate!: string;

  @ApiProperty({ nullable: true, type: String })
  description!: string | null;
}
