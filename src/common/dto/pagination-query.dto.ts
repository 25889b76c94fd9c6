import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class PaginationQueryDto {
  @ApiPropertyOptional({ example: 1, default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @ApiPropertyOptional({ example: 20, default: 20, minimum: 1, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 20;
}

export interface Paginated<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
}

export function toSkipTake(query: Pick<PaginationQueryDto, 'page' | 'limit'>): {
  skip: number;
  take: number;
} {
  return { skip: (query.page - 1) * query.limit, take: query.limit };
}

export function paginate<T, R>(
  [entities, total]: [T[], number],
  query: Pick<PaginationQueryDto, 'page' | 'limit'>,
  map: (entity: T) => R,
): Paginated<R> {
  return {
    items: entities.map(map),
    total,
    page: query.page,
    limit: query.limit,
  };
}
