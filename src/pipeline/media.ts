import { execa } from 'execa';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ConfigurationError } from './errors';
import { debug, errorMessage, info } from './log';
import type { AudioPayload } from './types';

/**
 * Media Extraction collaborator: the engine never does codec work itself.
 */
export interface MediaExtractor {
    probeDuration(sourcePath: string): Promise<number>;
    extractRange(sourcePath: string, startSec: number, endSec: number): Promise<AudioPayload>;
}

export const WAV_MIME = 'audio/wav';

function shortMessage(e: unknown): string {
    if (e && typeof e === 'object' && 'shortMessage' in e && typeof e.shortMessage === 'string') {
        return e.shortMessage;
    }
    return errorMessage(e);
}

export interface FfmpegOptions {
    ffmpegBin?: string;
    ffprobeBin?: string;
    sampleRate?: number;
}

export class FfmpegMediaExtractor implements MediaExtractor {
    private readonly ffmpegBin: string;
    private readonly ffprobeBin: string;
    private readonly sampleRate: number;

    constructor(opts: FfmpegOptions = {}) {
        this.ffmpegBin = opts.ffmpegBin ?? 'ffmpeg';
        this.ffprobeBin = opts.ffprobeBin ?? 'ffprobe';
        this.sampleRate = opts.sampleRate ?? 16000;
    }

    async probeDuration(sourcePath: string): Promise<number> {
        if (!(await fs.pathExists(sourcePath))) {
            throw new ConfigurationError(`Input media not found: ${sourcePath}`, { sourcePath });
        }
        const probe = await execa(this.ffprobeBin, [
            '-v',
            'error',
            '-show_entries',
            'format=duration',
            '-of',
            'default=noprint_wrappers=1:nokey=1',
            sourcePath,
        ]);
        const parsed = parseFloat(probe.stdout);
        if (!Number.isFinite(parsed) || parsed <= 0) {
            throw new ConfigurationError(
                `ffprobe could not determine duration for ${sourcePath}. Raw output: ${probe.stdout}`,
                { sourcePath }
            );
        }
        info('media.probe', { sourcePath, durationSec: parsed });
        return parsed;
    }

    async extractRange(sourcePath: string, startSec: number, endSec: number): Promise<AudioPayload> {
        const segmentDur = Math.max(0, endSec - startSec);
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'captioner-'));
        const outPath = path.join(tmpDir, 'range.wav');
        try {
            // Use accurate seeking by placing -ss after -i. WAV PCM mono at the configured rate.
            await execa(this.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                sourcePath,
                '-ss',
                String(startSec),
                '-t',
                String(segmentDur),
                '-vn',
                '-sn',
                '-ac',
                '1',
                '-ar',
                String(this.sampleRate),
                '-acodec',
                'pcm_s16le',
                '-f',
                'wav',
                outPath,
            ]);
            const data = await fs.readFile(outPath);
            debug('media.extract', { sourcePath, startSec, endSec, bytes: data.length });
            return { data, mimeType: WAV_MIME };
        } catch (e) {
            throw new Error(
                `ffmpeg failed while extracting [${startSec}, ${endSec}) from ${sourcePath}. Underlying error: ${shortMessage(e)}`
            );
        } finally {
            await fs.remove(tmpDir);
        }
    }
}

/**
 * Pull the audio track out of a video container once per job, normalised to mono WAV.
 */
export async function extractAudioTrack(
    videoPath: string,
    audioPath: string,
    opts: FfmpegOptions = {}
): Promise<string> {
    if (!(await fs.pathExists(videoPath))) {
        throw new ConfigurationError(`Input media not found: ${videoPath}`, { videoPath });
    }
    await fs.ensureDir(path.dirname(audioPath));
    try {
        await execa(opts.ffmpegBin ?? 'ffmpeg', [
            '-y',
            '-loglevel',
            'error',
            '-nostdin',
            '-i',
            videoPath,
            '-vn',
            '-ac',
            '1',
            '-ar',
            String(opts.sampleRate ?? 16000),
            '-acodec',
            'pcm_s16le',
            audioPath,
        ]);
    } catch (e) {
        throw new Error(`ffmpeg could not extract audio from ${videoPath}: ${shortMessage(e)}`);
    }
    const stat = await fs.stat(audioPath);
    if (stat.size === 0) {
        throw new Error(`Extracted audio is empty (0 bytes): ${audioPath}. Does the input have an audio stream?`);
    }
    info('media.audio', { videoPath, audioPath, bytes: stat.size });
    return audioPath;
}
