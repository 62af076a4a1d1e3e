import type { AudioFrame } from '@voicegate/shared';

export function frameDurationMs(frame: AudioFrame): number {
    if (frame.sampleRate <= 0) return 0;
    return (frame.samples.length / frame.sampleRate) * 1000;
}

/**
 * RMS energy of a frame, with 16-bit samples normalized to -1..1.
 */
export function frameEnergy(frame: AudioFrame): number {
    const { samples } = frame;
    if (samples.length === 0) return 0;

    let sum = 0;
    for (const sample of samples) {
        const normalized = sample / 32768;
        sum += normalized * normalized;
    }
    return Math.sqrt(sum / samples.length);
}

export function isSpeechFrame(frame: AudioFrame, energyThreshold: number): boolean {
    return frameEnergy(frame) > energyThreshold;
}

export function createFrame(samples: Int16Array, sampleRate: number, timestamp: number): AudioFrame {
    return Object.freeze({ samples, sampleRate, timestamp });
}

/**
 * Split raw little-endian 16-bit PCM into frames of `samplesPerFrame`.
 * A trailing odd byte is ignored.
 */
export function framesFromPcm(
    pcm: Buffer,
    sampleRate: number,
    samplesPerFrame = 1024,
    startTimestamp = 0
): AudioFrame[] {
    const totalSamples = Math.floor(pcm.length / 2);
    const frames: AudioFrame[] = [];
    const frameMs = (samplesPerFrame / sampleRate) * 1000;

    for (let offset = 0, index = 0; offset < totalSamples; offset += samplesPerFrame, index++) {
        const count = Math.min(samplesPerFrame, totalSamples - offset);
        const samples = new Int16Array(count);
        for (let i = 0; i < count; i++) {
            samples[i] = pcm.readInt16LE((offset + i) * 2);
        }
        frames.push(createFrame(samples, sampleRate, startTimestamp + index * frameMs));
    }
    return frames;
}

export function pcmFromFrames(frames: readonly AudioFrame[]): Buffer {
    const totalSamples = frames.reduce((total, frame) => total + frame.samples.length, 0);
    const pcm = Buffer.alloc(totalSamples * 2);
    let offset = 0;
    for (const frame of frames) {
        for (const sample of frame.samples) {
            pcm.writeInt16LE(sample, offset);
            offset += 2;
        }
    }
    return pcm;
}

/**
 * Wrap 16-bit mono PCM in a RIFF/WAVE header for transcription back ends
 * that expect a file upload.
 */
export function encodeWav(frames: readonly AudioFrame[], sampleRate: number): Buffer {
    const pcm = pcmFromFrames(frames);
    const header = Buffer.alloc(44);
    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcm.length, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20);
    header.writeUInt16LE(1, 22);
    header.writeUInt32LE(sampleRate, 24);
    header.writeUInt32LE(sampleRate * 2, 28);
    header.writeUInt16LE(2, 32);
    header.writeUInt16LE(16, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcm.length, 40);
    return Buffer.concat([header, pcm]);
}
