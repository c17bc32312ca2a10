import { PcmAudio } from './types';

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;

/**
 * Encode planar float audio as a 16-bit PCM RIFF/WAVE file held in memory.
 */
export const encodeWav = (audio: PcmAudio): Buffer => {
    const channelCount = audio.channels.length;
    const frames = audio.channels[0]?.length ?? 0;
    const blockAlign = channelCount * BITS_PER_SAMPLE / 8;
    const dataSize = frames * blockAlign;

    const buffer = Buffer.alloc(HEADER_SIZE + dataSize);
    buffer.write('RIFF', 0, 'ascii');
    buffer.writeUInt32LE(36 + dataSize, 4);
    buffer.write('WAVE', 8, 'ascii');
    buffer.write('fmt ', 12, 'ascii');
    buffer.writeUInt32LE(16, 16);
    buffer.writeUInt16LE(1, 20);
    buffer.writeUInt16LE(channelCount, 22);
    buffer.writeUInt32LE(audio.sampleRate, 24);
    buffer.writeUInt32LE(audio.sampleRate * blockAlign, 28);
    buffer.writeUInt16LE(blockAlign, 32);
    buffer.writeUInt16LE(BITS_PER_SAMPLE, 34);
    buffer.write('data', 36, 'ascii');
    buffer.writeUInt32LE(dataSize, 40);

    let offset = HEADER_SIZE;
    for (let i = 0; i < frames; i++) {
        for (let c = 0; c < channelCount; c++) {
            const sample = Math.max(-1, Math.min(1, audio.channels[c][i]));
            buffer.writeInt16LE(Math.round(sample < 0 ? sample * 0x8000 : sample * 0x7fff), offset);
            offset += 2;
        }
    }
    return buffer;
};

export const durationSeconds = (audio: PcmAudio): number => {
    const frames = audio.channels[0]?.length ?? 0;
    return audio.sampleRate > 0 ? frames / audio.sampleRate : 0;
};
