import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateScreeningTables1760000000000 implements MigrationInterface {
  name = 'CreateScreeningTables1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "risk_descriptions" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "riskType" varchar NOT NULL,
        "riskLevel" varchar NOT NULL CHECK ("riskLevel" IN ('no_data', 'no_risk', 'low', 'medium', 'high', 'undetermined')),
        "riskDescription" varchar NOT NULL DEFAULT '',
        "riskDescriptionInfo" text NOT NULL DEFAULT '',
        "info" text NOT NULL DEFAULT ''
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_risk_descriptions_type_level" ON "risk_descriptions" ("riskType", "riskLevel")`,
    );

    await queryRunner.query(`
      CREATE TABLE "reference_list_entries" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "listName" varchar NOT NULL CHECK ("listName" IN ('uani', 'cargo_countries', 'port_countries')),
        "key" varchar NOT NULL,
        "name" varchar,
        "details" jsonb NOT NULL DEFAULT '{}',
        "createdAt" timestamp NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_reference_list_entries_list_key" ON "reference_list_entries" ("listName", "key")`,
    );

    await queryRunner.query(`
      CREATE TABLE "screening_logs" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "subjectId" varchar NOT NULL,
        "checkIds" jsonb NOT NULL,
        "params" jsonb NOT NULL DEFAULT '{}',
        "status" varchar NOT NULL CHECK (status IN ('completed', 'cancelled', 'rejected')),
        "overallLevel" varchar,
        "records" jsonb NOT NULL DEFAULT '[]',
        "errorMessage" text,
        "durationMs" integer NOT NULL DEFAULT 0,
        "createdAt" timestamp NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_screening_logs_subject_created" ON "screening_logs" ("subjectId", "createdAt")`,
    );

    await queryRunner.query(`
      CREATE TABLE "entity_signals" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "entityId" varchar NOT NULL,
        "entityDate" varchar,
        "activeStatus" varchar,
        "primaryName" varchar,
        "secondaryName" varchar,
        "primaryCountry" varchar,
        "secondaryCountry" varchar,
        "dateValue" varchar,
        "sanctionsName" varchar,
        "sanctionDescription" text,
        "scopeDescription" text,
        "startTime" varchar,
        "endTime" varchar,
        "isSan" varchar,
        "isSco" varchar,
        "isOol" varchar
      )
    `);
    await queryRunner.query(`CREATE INDEX "IDX_entity_signals_entityId" ON "entity_signals" ("entityId")`);

    await queryRunner.query(`
      CREATE TABLE "sanctioned_countries" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "countryName" varchar NOT NULL UNIQUE
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "entity_associated_parties" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "entityId" varchar NOT NULL,
        "partyId" varchar NOT NULL,
        "partyName" varchar,
        "level" varchar,
        "sourceType" varchar,
        "relation" varchar
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_entity_associated_parties_entityId" ON "entity_associated_parties" ("entityId")`,
    );

    await queryRunner.query(`
      CREATE TABLE "entity_verdicts" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "entityId" varchar NOT NULL,
        "entityDate" varchar,
        "activeStatus" varchar,
        "primaryName" varchar,
        "secondaryName" varchar,
        "primaryCountry" varchar,
        "secondaryCountry" varchar,
        "dateValue" varchar,
        "sanctionsLevel" varchar NOT NULL CHECK ("sanctionsLevel" IN ('high', 'medium', 'no_risk')),
        "high" jsonb NOT NULL DEFAULT '[]',
        "medium" jsonb NOT NULL DEFAULT '[]',
        "undetermined" jsonb NOT NULL DEFAULT '[]',
        "none" jsonb NOT NULL DEFAULT '[]',
        "associatedParties" jsonb NOT NULL DEFAULT '[]',
        "runId" varchar NOT NULL,
        "createdAt" timestamp NOT NULL DEFAULT now()
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX "IDX_entity_verdicts_entityId" ON "entity_verdicts" ("entityId")`);
    await queryRunner.query(`CREATE INDEX "IDX_entity_verdicts_primaryName" ON "entity_verdicts" ("primaryName")`);

    await queryRunner.query(`
      CREATE TABLE "entity_risk_runs" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "status" varchar NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
        "evaluatedAt" timestamptz NOT NULL,
        "entityCount" integer NOT NULL DEFAULT 0,
        "errorMessage" text,
        "createdAt" timestamp NOT NULL DEFAULT now(),
        "updatedAt" timestamp NOT NULL DEFAULT now()
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "entity_risk_runs"`);
    await queryRunner.query(`DROP TABLE "entity_verdicts"`);
    await queryRunner.query(`DROP TABLE "entity_associated_parties"`);
    await queryRunner.query(`DROP TABLE "sanctioned_countries"`);
    await queryRunner.query(`DROP TABLE "entity_signals"`);
    await queryRunner.query(`DROP TABLE "screening_logs"`);
    await queryRunner.query(`DROP TABLE "reference_list_entries"`);
    await queryRunner.query(`DROP TABLE "risk_descriptions"`);
  }
}
