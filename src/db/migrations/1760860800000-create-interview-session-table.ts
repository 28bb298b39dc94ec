import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateInterviewSessionTable1760860800000 implements MigrationInterface {
    name = 'CreateInterviewSessionTable1760860800000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "interview_sessions" ("id" character varying(64) NOT NULL, "status" character varying(20) NOT NULL, "schema_version" integer NOT NULL, "document" jsonb NOT NULL, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_interview_sessions_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_interview_sessions_status" ON "interview_sessions" ("status")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_interview_sessions_status"`);
        await queryRunner.query(`DROP TABLE "interview_sessions"`);
    }

}
