import { ValidationError } from '../errors/interview-errors';

export interface DecodedAudio {
    sampleRate: number;
    channels: number;
    /** Mono samples in [-1, 1]; multi-channel input is averaged. */
    samples: Float32Array;
}

const HEADER_BYTES = 44;

/**
 * Wrap 16-bit little-endian PCM in a canonical RIFF/WAVE header
 */
export function encodeWav(pcm: Buffer, sampleRate: number, channels: number = 1): Buffer {
    const bitsPerSample = 16;
    const blockAlign = channels * (bitsPerSample / 8);
    const header = Buffer.alloc(HEADER_BYTES);

    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcm.length, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20); // PCM
    header.writeUInt16LE(channels, 22);
    header.writeUInt32LE(sampleRate, 24);
    header.writeUInt32LE(sampleRate * blockAlign, 28);
    header.writeUInt16LE(blockAlign, 32);
    header.writeUInt16LE(bitsPerSample, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcm.length, 40);

    return Buffer.concat([header, pcm]);
}

/**
 * Decode a 16-bit PCM WAV file
 *
 * Walks the chunk list instead of assuming a 44-byte header, since recorders
 * commonly insert LIST or fact chunks before `data`.
 */
export function decodeWav(buffer: Buffer): DecodedAudio {
    if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
        throw new ValidationError('Audio is not a RIFF/WAVE file');
    }

    let offset = 12;
    let sampleRate = 0;
    let channels = 0;
    let bitsPerSample = 0;
    let data: Buffer | null = null;

    while (offset + 8 <= buffer.length) {
        const chunkId = buffer.toString('ascii', offset, offset + 4);
        const chunkSize = buffer.readUInt32LE(offset + 4);
        const body = offset + 8;

        if (chunkId === 'fmt ') {
            const format = buffer.readUInt16LE(body);
            if (format !== 1) {
                throw new ValidationError(`Unsupported WAV encoding ${format}; expected PCM`);
            }
            channels = buffer.readUInt16LE(body + 2);
            sampleRate = buffer.readUInt32LE(body + 4);
            bitsPerSample = buffer.readUInt16LE(body + 14);
        } else if (chunkId === 'data') {
            data = buffer.subarray(body, Math.min(body + chunkSize, buffer.length));
        }

        // chunks are word aligned
        offset = body + chunkSize + (chunkSize % 2);
    }

    if (!data || sampleRate === 0 || channels === 0) {
        throw new ValidationError('WAV file is missing its fmt or data chunk');
    }
    if (bitsPerSample !== 16) {
        throw new ValidationError(`Unsupported WAV bit depth ${bitsPerSample}; expected 16`);
    }

    const frameCount = Math.floor(data.length / (2 * channels));
    const samples = new Float32Array(frameCount);
    for (let frame = 0; frame < frameCount; frame++) {
        let sum = 0;
        for (let channel = 0; channel < channels; channel++) {
            sum += data.readInt16LE((frame * channels + channel) * 2);
        }
        samples[frame] = sum / channels / 32768;
    }

    return { sampleRate, channels, samples };
}
