import { Processor, Queue, QueueEvents, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { getSettings, Settings } from '../config/settings';

export const RESPONSE_QUEUE_NAME = 'response-analysis';

export interface ResponseJobData {
    sessionId: string;
    questionId: string;
    /** Uploaded WAV file, removed by the worker once the answer is settled */
    audioPath: string;
}

export interface ResponseJobResult {
    sessionId: string;
    questionId: string;
    recorded: boolean;
    status?: string;
    technical?: number;
    stop?: boolean;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for scoring uploaded answers in the background.
 * Handles job queuing, processing, and monitoring.
 */
export class QueueConfig {
    private redis: Redis;
    private responseQueue: Queue<ResponseJobData, ResponseJobResult>;
    private responseWorker: Worker<ResponseJobData, ResponseJobResult> | null = null;
    private queueEvents: QueueEvents;

    constructor(private settings: Settings = getSettings()) {
        // Redis connection
        this.redis = new Redis(settings.REDIS_URL, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        // Response analysis queue
        this.responseQueue = new Queue<ResponseJobData, ResponseJobResult>(RESPONSE_QUEUE_NAME, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 50,
                attempts: settings.RESPONSE_MAX_ATTEMPTS,
                backoff: {
                    type: 'exponential',
                    delay: 2000,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(RESPONSE_QUEUE_NAME, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    /**
     * Enqueue an uploaded answer for scoring
     */
    async enqueueResponse(data: ResponseJobData): Promise<string | undefined> {
        const job = await this.responseQueue.add('analyze-response', data);
        logger.info({
            jobId: job.id,
            sessionId: data.sessionId,
            questionId: data.questionId,
            queueName: RESPONSE_QUEUE_NAME
        }, 'Response job added to queue');
        return job.id;
    }

    /**
     * Start the response worker. Calling it again keeps the running worker.
     */
    startWorker(processor: Processor<ResponseJobData, ResponseJobResult>): Worker<ResponseJobData, ResponseJobResult> {
        if (this.responseWorker) {
            return this.responseWorker;
        }

        const worker = new Worker<ResponseJobData, ResponseJobResult>(RESPONSE_QUEUE_NAME, processor, {
            connection: this.redis,
            // Sessions are independent; one session never has two answers in flight
            concurrency: this.settings.RESPONSE_WORKER_CONCURRENCY,
        });

        worker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                sessionId: job.data.sessionId,
                recorded: job.returnvalue.recorded,
                duration: (job.finishedOn ?? Date.now()) - job.timestamp
            }, 'Response job completed');
        });

        worker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                sessionId: job?.data.sessionId,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Response job failed');
        });

        worker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Response job stalled');
        });

        this.responseWorker = worker;
        return worker;
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.debug({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('completed', ({ jobId }) => {
            logger.debug({ jobId }, 'Job completed successfully');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.warn({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close() {
        await this.responseWorker?.close();
        await this.responseQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
