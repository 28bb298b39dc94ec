import { Repository } from 'typeorm';
import { logger, ILogger } from '../config/logger';
import { AppDataSource } from '../db/data-source';
import { InterviewSessionRecord } from '../db/entities/interview-session.entity';
import { IRepository } from '../db/interfaces';
import { SESSION_SCHEMA_VERSION, deserializeSession, serializeSession } from '../db/session-document';
import { ExternalServiceUnavailableError, SessionNotFoundError, errorMessage } from '../errors/interview-errors';
import { ISessionStore } from '../types/collaborators';
import { InterviewSession } from '../types/interview';

/**
 * Wrap a TypeORM repository. The repository is resolved on first use, after
 * the data source has been initialized.
 */
export function sessionRecordRepository(
    resolve: () => Repository<InterviewSessionRecord>
): IRepository<InterviewSessionRecord> {
    return {
        findById: id => resolve().findOneBy({ id }),
        save: record => resolve().save(record)
    };
}

/**
 * Session Store
 *
 * Saves sessions as versioned JSON documents in Postgres. Database errors
 * surface as ExternalServiceUnavailableError('session-store'); a missing row
 * is SessionNotFoundError and a bad document is ValidationError.
 */
export class SessionStore implements ISessionStore {
    constructor(
        private repository: IRepository<InterviewSessionRecord>,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): SessionStore {
        return new SessionStore(
            sessionRecordRepository(() => AppDataSource.getRepository(InterviewSessionRecord)),
            logger
        );
    }

    async persist(session: InterviewSession): Promise<void> {
        const record = new InterviewSessionRecord();
        record.id = session.id;
        record.status = session.status;
        record.schemaVersion = SESSION_SCHEMA_VERSION;
        record.document = serializeSession(session);

        try {
            await this.repository.save(record);
        } catch (error) {
            this.logger.error({
                sessionId: session.id,
                version: session.version,
                error: errorMessage(error)
            }, 'Failed to persist interview session');
            throw new ExternalServiceUnavailableError('session-store', errorMessage(error));
        }

        this.logger.debug({
            sessionId: session.id,
            status: session.status,
            version: session.version
        }, 'Interview session persisted');
    }

    async load(sessionId: string): Promise<InterviewSession> {
        let record: InterviewSessionRecord | null;
        try {
            record = await this.repository.findById(sessionId);
        } catch (error) {
            this.logger.error({ sessionId, error: errorMessage(error) }, 'Failed to load interview session');
            throw new ExternalServiceUnavailableError('session-store', errorMessage(error));
        }

        if (!record) {
            throw new SessionNotFoundError(sessionId);
        }

        return deserializeSession(record.schemaVersion, record.document);
    }
}
