import { Column, CreateDateColumn, Entity, Index, PrimaryColumn, UpdateDateColumn } from "typeorm";

/**
 * Interview Session Record
 *
 * One row per interview session. The whole session (questions, answers, arm
 * stats, metrics) lives in `document` as versioned JSON; `status` is copied
 * out so sessions can be listed by state without reading the document.
 *
 * `schema_version` names the document layout. Loading a row with a version
 * this build does not know fails instead of guessing.
 */
@Entity({ name: "interview_sessions" })
export class InterviewSessionRecord {
    @PrimaryColumn({
        type: "varchar",
        length: 64
    })
    id!: string;

    @Index("IDX_interview_sessions_status")
    @Column({
        type: "varchar",
        length: 20
    })
    status!: string; // created → in_progress ⇄ paused → completed/cancelled

    @Column({
        name: "schema_version",
        type: "int"
    })
    schemaVersion!: number;

    @Column({
        type: "jsonb"
    })
    document!: unknown;

    @CreateDateColumn({ name: "created_at" })
    createdAt!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updatedAt!: Date;
}
