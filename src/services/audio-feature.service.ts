import { logger, ILogger } from '../config/logger';
import { ExternalServiceUnavailableError, errorMessage } from '../errors/interview-errors';
import { AudioFeatures, IAudioFeatureExtractor } from '../types/collaborators';
import { mean, populationStdDev } from '../utils/statistics.util';
import { decodeWav } from '../utils/wav.util';

export interface AudioFeatureOptions {
    frameMs?: number;
    /** RMS level (full scale = 1) below which a frame counts as silence */
    silenceThreshold?: number;
    minPauseMs?: number;
    pitchWindow?: number;
}

function rms(samples: Float32Array, start: number, end: number): number {
    let sum = 0;
    for (let i = start; i < end; i++) {
        sum += samples[i] * samples[i];
    }
    return end > start ? Math.sqrt(sum / (end - start)) : 0;
}

function zeroCrossings(samples: Float32Array, start: number, end: number): number {
    let crossings = 0;
    for (let i = start + 1; i < end; i++) {
        if ((samples[i - 1] < 0) !== (samples[i] < 0)) {
            crossings++;
        }
    }
    return crossings;
}

/**
 * Audio Feature Service
 *
 * Signal-level heuristics over a PCM16 WAV answer:
 * - pitch: mean zero-crossing frequency over voiced windows
 * - fluency: 1 - pauses per second, where a pause is a run of silent frames
 *   lasting at least `minPauseMs`
 * - emotion weights: steady, mostly voiced speech leans "confident"; long
 *   silences and uneven loudness lean "nervous"; "neutral" is a fixed baseline
 */
export class AudioFeatureService implements IAudioFeatureExtractor {
    private readonly frameMs: number;
    private readonly silenceThreshold: number;
    private readonly minPauseMs: number;
    private readonly pitchWindow: number;

    constructor(
        private logger: ILogger,
        options: AudioFeatureOptions = {}
    ) {
        this.frameMs = options.frameMs ?? 100;
        this.silenceThreshold = options.silenceThreshold ?? 0.03;
        this.minPauseMs = options.minPauseMs ?? 300;
        this.pitchWindow = options.pitchWindow ?? 512;
    }

    static create(): AudioFeatureService {
        return new AudioFeatureService(logger);
    }

    async extract(audio: Buffer): Promise<AudioFeatures> {
        try {
            const features = this.analyze(audio);
            this.logger.debug({
                durationSec: features.durationSec,
                fluency: features.fluency,
                pitch: features.pitch
            }, 'Audio features extracted');
            return features;
        } catch (error) {
            throw new ExternalServiceUnavailableError('audio-features', errorMessage(error));
        }
    }

    private analyze(audio: Buffer): AudioFeatures {
        const { samples, sampleRate } = decodeWav(audio);
        const durationSec = samples.length / sampleRate;

        if (samples.length === 0) {
            return { fluency: 0, pitch: 0, emotionWeights: { neutral: 1 }, durationSec: 0 };
        }

        const frameSize = Math.max(1, Math.round(sampleRate * this.frameMs / 1000));
        const frameLevels: number[] = [];
        for (let start = 0; start < samples.length; start += frameSize) {
            frameLevels.push(rms(samples, start, Math.min(start + frameSize, samples.length)));
        }

        const minPauseFrames = Math.max(1, Math.ceil(this.minPauseMs / this.frameMs));
        let pauses = 0;
        let silentRun = 0;
        for (const level of frameLevels) {
            if (level < this.silenceThreshold) {
                silentRun++;
                if (silentRun === minPauseFrames) {
                    pauses++;
                }
            } else {
                silentRun = 0;
            }
        }

        const fluency = Math.max(0, 1 - Math.min(pauses / durationSec, 1));

        return {
            fluency,
            pitch: this.estimatePitch(samples, sampleRate),
            emotionWeights: this.estimateEmotions(frameLevels),
            durationSec
        };
    }

    private estimatePitch(samples: Float32Array, sampleRate: number): number {
        const hop = Math.floor(this.pitchWindow / 2);
        const pitches: number[] = [];
        for (let start = 0; start + this.pitchWindow <= samples.length; start += hop) {
            const end = start + this.pitchWindow;
            if (rms(samples, start, end) < this.silenceThreshold) {
                continue;
            }
            pitches.push(zeroCrossings(samples, start, end) * sampleRate / (2 * this.pitchWindow));
        }
        return mean(pitches);
    }

    private estimateEmotions(frameLevels: number[]): Record<string, number> {
        const voiced = frameLevels.filter(level => level >= this.silenceThreshold);
        const speechRatio = voiced.length / frameLevels.length;
        const voicedMean = mean(voiced);
        const unevenness = voicedMean > 0 ? Math.min(populationStdDev(voiced) / voicedMean, 1) : 0;

        const raw: Record<string, number> = {
            confident: speechRatio * (1 - unevenness),
            nervous: (1 - speechRatio) * 0.5 + unevenness * 0.5,
            neutral: 0.2
        };

        const total = Object.values(raw).reduce((sum, weight) => sum + weight, 0);
        const weights: Record<string, number> = {};
        for (const [label, weight] of Object.entries(raw)) {
            if (weight > 0) {
                weights[label] = weight / total;
            }
        }
        return weights;
    }
}

let audioFeatureService: AudioFeatureService | null = null;

export function getAudioFeatureService(): AudioFeatureService {
    if (!audioFeatureService) {
        audioFeatureService = AudioFeatureService.create();
    }
    return audioFeatureService;
}
