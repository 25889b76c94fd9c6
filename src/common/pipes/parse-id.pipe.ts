import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

/** Largest value a PostgreSQL `integer` (`SERIAL`) key can hold. */
export const MAX_ID = 2147483647;

@Injectable()
export class ParseIdPipe implements PipeTransform<string, number> {
  transform(value: string): number {
    if (!/^\d+$/.test(value)) {
      throw new BadRequestException('Validation failed (numeric id is expected)');
    }

    const id = Number(value);
    if (id < 1 || id > MAX_ID) {
      throw new BadRequestException(`Validation failed (id must be between 1 and ${MAX_ID})`);
    }

    return id;
  }
}
