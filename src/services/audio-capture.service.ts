import { Readable } from 'stream';
import { logger, ILogger } from '../config/logger';
import { ValidationError, errorMessage } from '../errors/interview-errors';
import { getSettings } from '../config/settings';
import { BoundedQueue } from '../utils/bounded-queue.util';
import { encodeWav } from '../utils/wav.util';

const BYTES_PER_SAMPLE = 2;

export interface AudioRecorderOptions {
    sampleRate?: number;
    frameMs?: number;
    maxDurationSec?: number;
}

export interface RecordedAudio {
    /** Raw mono 16-bit little-endian PCM */
    pcm: Buffer;
    wav: Buffer;
    durationSec: number;
}

/**
 * Audio Recorder
 *
 * Consumes a mono PCM16 stream, slices it into fixed-size frames and buffers
 * them in a bounded queue holding at most `maxDurationSec` of audio. When the
 * queue fills up the source is paused, so a recording that runs past the
 * limit applies backpressure instead of growing memory.
 *
 * The sessions API records streamed answers through `record`.
 */
export class AudioRecorder {
    readonly sampleRate: number;
    private readonly frameBytes: number;
    private readonly capacity: number;

    private queue: BoundedQueue<Buffer> | null = null;
    private source: Readable | null = null;
    private partial: Buffer = Buffer.alloc(0);
    private sourceError: Error | null = null;
    private onLimit: (() => void) | null = null;

    private readonly onData = (chunk: Buffer | string) => this.handleData(chunk);
    private readonly onError = (error: Error) => {
        this.sourceError = error;
        this.logger.error({ error: errorMessage(error) }, 'Audio source failed during recording');
    };
    private readonly onEnd = () => {
        this.logger.debug({ bufferedFrames: this.queue?.size ?? 0 }, 'Audio source ended');
    };

    constructor(
        private logger: ILogger,
        options: AudioRecorderOptions = {}
    ) {
        this.sampleRate = options.sampleRate ?? 16000;
        const frameMs = options.frameMs ?? 100;
        const maxDurationSec = options.maxDurationSec ?? 120;

        this.frameBytes = Math.max(1, Math.round(this.sampleRate * frameMs / 1000)) * BYTES_PER_SAMPLE;
        this.capacity = Math.max(1, Math.ceil(maxDurationSec * 1000 / frameMs));
    }

    static create(): AudioRecorder {
        const settings = getSettings();
        return new AudioRecorder(logger, {
            sampleRate: settings.SAMPLE_RATE,
            maxDurationSec: settings.RECORDING_TIMEOUT_SEC
        });
    }

    get isRecording(): boolean {
        return this.source !== null;
    }

    /**
     * Start consuming `source`. A second call while recording is ignored.
     */
    start(source: Readable): void {
        if (this.source) {
            this.logger.debug({}, 'Recorder already running, ignoring start');
            return;
        }

        this.queue = new BoundedQueue<Buffer>(this.capacity);
        this.partial = Buffer.alloc(0);
        this.sourceError = null;
        this.source = source;

        source.on('data', this.onData);
        source.on('error', this.onError);
        source.on('end', this.onEnd);
        source.resume();

        this.logger.info({
            sampleRate: this.sampleRate,
            maxFrames: this.capacity
        }, 'Audio recording started');
    }

    /**
     * Record `source` until it ends or the recording limit is reached
     */
    record(source: Readable): Promise<RecordedAudio> {
        if (this.source) {
            return Promise.reject(new ValidationError('Recorder is already running'));
        }

        return new Promise<RecordedAudio>((resolve, reject) => {
            const detach = () => {
                source.off('end', finish);
                source.off('error', fail);
                this.onLimit = null;
            };
            const finish = () => {
                detach();
                const recording = this.stop();
                if (recording) {
                    resolve(recording);
                } else {
                    reject(new ValidationError('Recording stopped before the source finished'));
                }
            };
            const fail = (error: Error) => {
                detach();
                this.stop();
                reject(error);
            };

            source.on('end', finish);
            source.on('error', fail);
            this.onLimit = finish;
            this.start(source);
        });
    }

    /**
     * Stop recording and return what was captured, or null when idle.
     * A trailing partial frame is kept; an odd trailing byte is not.
     */
    stop(): RecordedAudio | null {
        const source = this.source;
        const queue = this.queue;
        if (!source || !queue) {
            return null;
        }

        source.off('data', this.onData);
        source.off('error', this.onError);
        source.off('end', this.onEnd);
        this.source = null;
        this.queue = null;

        const frames = queue.drain();
        const tail = this.partial.subarray(0, this.partial.length - (this.partial.length % BYTES_PER_SAMPLE));
        if (tail.length > 0) {
            frames.push(tail);
        }
        this.partial = Buffer.alloc(0);

        const pcm = Buffer.concat(frames);
        const durationSec = pcm.length / (this.sampleRate * BYTES_PER_SAMPLE);

        this.logger.info({
            durationSec,
            frames: frames.length,
            sourceFailed: this.sourceError !== null
        }, 'Audio recording stopped');

        return { pcm, wav: encodeWav(pcm, this.sampleRate), durationSec };
    }

    private handleData(chunk: Buffer | string): void {
        const queue = this.queue;
        const source = this.source;
        if (!queue || !source || queue.isFull) {
            return;
        }

        const data = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk;
        this.partial = this.partial.length > 0 ? Buffer.concat([this.partial, data]) : data;

        while (this.partial.length >= this.frameBytes) {
            queue.push(Buffer.from(this.partial.subarray(0, this.frameBytes)));
            this.partial = this.partial.subarray(this.frameBytes);

            if (queue.isFull) {
                // the recording limit is reached; later audio is not kept
                source.pause();
                this.logger.warn({
                    maxFrames: queue.capacity,
                    droppedBytes: this.partial.length
                }, 'Recording buffer full, pausing audio source');
                this.partial = Buffer.alloc(0);
                this.onLimit?.();
                return;
            }
        }
    }
}
