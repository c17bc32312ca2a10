import ffmpeg from 'fluent-ffmpeg';
import { PassThrough } from 'node:stream';
import { Logger } from 'winston';
import { PcmAudio } from '../audio/types';

export interface AudioInfo {
    channels: number;
    sampleRate: number;
    duration: number;
}

export interface Media {
    probe: (filePath: string) => Promise<AudioInfo>;
    decode: (filePath: string) => Promise<PcmAudio>;
}

const ffprobeAsync = (filePath: string): Promise<ffmpeg.FfprobeData> => {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err, metadata) => {
            if (err) return reject(err);
            resolve(metadata);
        });
    });
};

// Interleaved little-endian float32 frames into one array per channel
export const deinterleave = (data: Buffer, channelCount: number): Float32Array[] => {
    const frameCount = Math.floor(data.length / 4 / channelCount);
    const channels: Float32Array[] = [];
    for (let c = 0; c < channelCount; c++) {
        channels.push(new Float32Array(frameCount));
    }
    for (let i = 0; i < frameCount; i++) {
        for (let c = 0; c < channelCount; c++) {
            channels[c][i] = data.readFloatLE((i * channelCount + c) * 4);
        }
    }
    return channels;
};

export const create = (logger: Logger): Media => {

    const probe = async (filePath: string): Promise<AudioInfo> => {
        const metadata = await ffprobeAsync(filePath);
        const stream = metadata.streams.find(s => s.codec_type === 'audio');
        if (!stream) {
            throw new Error(`No audio stream in ${filePath}`);
        }

        const info: AudioInfo = {
            channels: stream.channels ?? 1,
            sampleRate: Number(stream.sample_rate ?? 0),
            duration: Number(metadata.format.duration ?? 0),
        };
        if (!info.sampleRate) {
            throw new Error(`Unknown sample rate for ${filePath}`);
        }

        logger.debug('Probed %s: %d channel(s), %d Hz, %ss', filePath, info.channels, info.sampleRate, info.duration);
        return info;
    };

    // Decodes at the source's own layout; preprocessing does the conversion in memory
    const decode = async (filePath: string): Promise<PcmAudio> => {
        const info = await probe(filePath);

        const data = await new Promise<Buffer>((resolve, reject) => {
            const chunks: Buffer[] = [];
            const output = new PassThrough();
            output.on('data', (chunk: Buffer) => chunks.push(chunk));
            output.on('end', () => resolve(Buffer.concat(chunks)));

            ffmpeg(filePath)
                .noVideo()
                .audioCodec('pcm_f32le')
                .format('f32le')
                .on('error', (err: Error) => {
                    logger.error('Error decoding audio file: %s', err.message);
                    reject(err);
                })
                .pipe(output, { end: true });
        });

        logger.debug('Decoded %s into %d bytes of PCM', filePath, data.length);
        return {
            sampleRate: info.sampleRate,
            channels: deinterleave(data, info.channels),
        };
    };

    return {
        probe,
        decode,
    };
};
