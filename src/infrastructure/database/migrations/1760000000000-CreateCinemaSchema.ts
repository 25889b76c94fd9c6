import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateCinemaSchema1760000000000 implements MigrationInterface {
  name = 'CreateCinemaSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TYPE "showtime_status_enum" AS ENUM ('SCHEDULED', 'COMPLETED', 'CANCELLED')
    `);

    await queryRunner.query(`
      CREATE TYPE "seat_status_enum" AS ENUM ('AVAILABLE', 'SOLD')
    `);

    await queryRunner.query(`
      CREATE TYPE "ticket_status_enum" AS ENUM ('ACTIVE', 'CANCELLED', 'CONSUMED')
    `);

    await queryRunner.query(`
      CREATE TABLE "movies" (
        "id" SERIAL NOT NULL,
        "title" varchar(255) NOT NULL,
        "duration_minutes" integer NOT NULL,
        "genre" varchar(30) NOT NULL,
        "release_date" date NOT NULL,
        "description" text,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_movies_title_release_date" UNIQUE ("title", "release_date"),
        CONSTRAINT "PK_movies" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "rooms" (
        "id" SERIAL NOT NULL,
        "name" varchar(255) NOT NULL,
        "rows" integer NOT NULL,
        "seats_per_row" integer NOT NULL,
        "active" boolean NOT NULL DEFAULT true,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_rooms_name" UNIQUE ("name"),
        CONSTRAINT "CHK_rooms_layout" CHECK ("rows" > 0 AND "seats_per_row" > 0),
        CONSTRAINT "PK_rooms" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "showtimes" (
        "id" SERIAL NOT NULL,
        "start_time" TIMESTAMP WITH TIME ZONE NOT NULL,
        "end_time" TIMESTAMP WITH TIME ZONE NOT NULL,
        "base_price" decimal(10,2) NOT NULL,
        "status" "showtime_status_enum" NOT NULL DEFAULT 'SCHEDULED',
        "movie_id" integer NOT NULL,
        "room_id" integer NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "CHK_showtimes_window" CHECK ("start_time" < "end_time"),
        CONSTRAINT "CHK_showtimes_base_price" CHECK ("base_price" >= 0),
        CONSTRAINT "PK_showtimes" PRIMARY KEY ("id"),
        CONSTRAINT "FK_showtimes_movie" FOREIGN KEY ("movie_id")
          REFERENCES "movies"("id") ON DELETE NO ACTION ON UPDATE NO ACTION,
        CONSTRAINT "FK_showtimes_room" FOREIGN KEY ("room_id")
          REFERENCES "rooms"("id") ON DELETE NO ACTION ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "seats" (
        "id" SERIAL NOT NULL,
        "showtime_id" integer NOT NULL,
        "row_number" integer NOT NULL,
        "seat_number" integer NOT NULL,
        "status" "seat_status_enum" NOT NULL DEFAULT 'AVAILABLE',
        CONSTRAINT "UQ_seats_showtime_row_seat" UNIQUE ("showtime_id", "row_number", "seat_number"),
        CONSTRAINT "PK_seats" PRIMARY KEY ("id"),
        CONSTRAINT "FK_seats_showtime" FOREIGN KEY ("showtime_id")
          REFERENCES "showtimes"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "tickets" (
        "id" SERIAL NOT NULL,
        "seat_id" integer NOT NULL,
        "purchased_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "price" decimal(10,2) NOT NULL,
        "customer_name" varchar(255) NOT NULL,
        "status" "ticket_status_enum" NOT NULL DEFAULT 'ACTIVE',
        CONSTRAINT "PK_tickets" PRIMARY KEY ("id"),
        CONSTRAINT "FK_tickets_seat" FOREIGN KEY ("seat_id")
          REFERENCES "seats"("id") ON DELETE NO ACTION ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX "UQ_tickets_live_seat" ON "tickets" ("seat_id")
      WHERE "status" <> 'CANCELLED'
    `);

    await queryRunner.query(`
      CREATE UNIQUE INDEX "UQ_showtimes_room_start_scheduled" ON "showtimes" ("room_id", "start_time")
      WHERE "status" = 'SCHEDULED'
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_showtimes_room_window" ON "showtimes" ("room_id", "start_time", "end_time")
      WHERE "status" = 'SCHEDULED'
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_showtimes_movie" ON "showtimes" ("movie_id")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_seats_showtime_status" ON "seats" ("showtime_id", "status")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_tickets_seat" ON "tickets" ("seat_id")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_tickets_seat"`);
    await queryRunner.query(`DROP INDEX "IDX_seats_showtime_status"`);
    await queryRunner.query(`DROP INDEX "IDX_showtimes_movie"`);
    await queryRunner.query(`DROP INDEX "IDX_showtimes_room_window"`);
    await queryRunner.query(`DROP INDEX "UQ_showtimes_room_start_scheduled"`);
    await queryRunner.query(`DROP INDEX "UQ_tickets_live_seat"`);

    await queryRunner.query(`DROP TABLE "tickets"`);
    await queryRunner.query(`DROP TABLE "seats"`);
    await queryRunner.query(`DROP TABLE "showtimes"`);
    await queryRunner.query(`DROP TABLE "rooms"`);
    await queryRunner.query(`DROP TABLE "movies"`);

    await queryRunner.query(`DROP TYPE "ticket_status_enum"`);
    await queryRunner.query(`DROP TYPE "seat_status_enum"`);
    await queryRunner.query(`DROP TYPE "showtime_status_enum"`);
  }
}
