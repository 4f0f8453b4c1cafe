import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateEventRsvpTables1760000000000 implements MigrationInterface {
  name = 'CreateEventRsvpTables1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" SERIAL NOT NULL,
        "name" character varying(255) NOT NULL,
        "email" character varying(255) NOT NULL,
        "username" character varying(255) NOT NULL,
        "password" character varying(255) NOT NULL,
        "admin" boolean NOT NULL DEFAULT false,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_users_email" UNIQUE ("email"),
        CONSTRAINT "PK_users_id" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_username" ON "users" ("username")`,
    );

    await queryRunner.query(`
      CREATE TABLE "sessions" (
        "id" SERIAL NOT NULL,
        "secureId" character varying(36) NOT NULL,
        "userId" integer,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        "deletedAt" TIMESTAMP,
        CONSTRAINT "UQ_sessions_secureId" UNIQUE ("secureId"),
        CONSTRAINT "PK_sessions_id" PRIMARY KEY ("id"),
        CONSTRAINT "FK_sessions_userId" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_sessions_userId" ON "sessions" ("userId")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_sessions_secureId" ON "sessions" ("secureId")`,
    );

    await queryRunner.query(`
      CREATE TABLE "events" (
        "id" SERIAL NOT NULL,
        "name" character varying(255) NOT NULL,
        "location" character varying(255) NOT NULL,
        "description" text NOT NULL,
        "price" numeric(10,2) NOT NULL DEFAULT 0,
        "capacity" integer NOT NULL,
        "startsAt" TIMESTAMP NOT NULL,
        "imageFileName" character varying(255),
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_events_id" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_events_name" ON "events" ("name")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_events_startsAt" ON "events" ("startsAt")`,
    );

    await queryRunner.query(`
      CREATE TABLE "registrations" (
        "id" SERIAL NOT NULL,
        "howHeard" character varying(50) NOT NULL,
        "eventId" integer NOT NULL,
        "userId" integer NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_registrations_id" PRIMARY KEY ("id"),
        CONSTRAINT "FK_registrations_eventId" FOREIGN KEY ("eventId")
          REFERENCES "events"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_registrations_userId" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_registrations_eventId" ON "registrations" ("eventId")`,
    );

    await queryRunner.query(`
      CREATE TABLE "likes" (
        "id" SERIAL NOT NULL,
        "eventId" integer NOT NULL,
        "userId" integer NOT NULL,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_likes_event_user" UNIQUE ("eventId", "userId"),
        CONSTRAINT "PK_likes_id" PRIMARY KEY ("id"),
        CONSTRAINT "FK_likes_eventId" FOREIGN KEY ("eventId")
          REFERENCES "events"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_likes_userId" FOREIGN KEY ("userId")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "likes"`);
    await queryRunner.query(`DROP INDEX "IDX_registrations_eventId"`);
    await queryRunner.query(`DROP TABLE "registrations"`);
    await queryRunner.query(`DROP INDEX "IDX_events_startsAt"`);
    await queryRunner.query(`DROP INDEX "IDX_events_name"`);
    await queryRunner.query(`DROP TABLE "events"`);
    await queryRunner.query(`DROP INDEX "IDX_sessions_secureId"`);
    await queryRunner.query(`DROP INDEX "IDX_sessions_userId"`);
    await queryRunner.query(`DROP TABLE "sessions"`);
    await queryRunner.query(`DROP INDEX "IDX_users_username"`);
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
