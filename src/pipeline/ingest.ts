import { execa } from 'execa';
import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { describeProcessFailure, ExtractionFailedError, UnsupportedFormatError } from './errors';
import { debug, info } from './log';
import { SourceType } from './types';

export const AUDIO_EXTENSIONS: readonly string[] = ['.mp3', '.wav', '.m4a', '.flac', '.ogg', '.wma', '.aac'];
export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4', '.avi', '.mov', '.mkv', '.wmv', '.flv', '.webm', '.m4v'];

function ext(filePath: string): string {
    return path.extname(filePath).toLowerCase();
}

export function isVideoFile(filePath: string): boolean {
    return VIDEO_EXTENSIONS.includes(ext(filePath));
}

export function isMediaFile(filePath: string): boolean {
    return AUDIO_EXTENSIONS.includes(ext(filePath)) || isVideoFile(filePath);
}

export function sourceTypeOf(filePath: string): SourceType {
    return isVideoFile(filePath) ? 'video' : 'audio';
}

/** Media files below `dir`, recursively, as sorted absolute paths */
export async function listMediaFiles(dir: string): Promise<string[]> {
    const root = path.resolve(dir);
    const found: string[] = [];
    const walk = async (current: string) => {
        const entries = await fs.readdir(current, { withFileTypes: true });
        for (const entry of entries) {
            const full = path.join(current, entry.name);
            if (entry.isDirectory()) await walk(full);
            else if (entry.isFile() && isMediaFile(entry.name)) found.push(full);
        }
    };
    await walk(root);
    return found.sort();
}

export interface MediaExtractor {
    /** Resolves to a 16 kHz mono WAV for the input */
    extractAudio(inputPath: string): Promise<string>;
}

export interface FfmpegExtractorOptions {
    outDir: string;
    ffmpegBin?: string;
    ffprobeBin?: string;
    maxFileBytes?: number;
    minDurationSec?: number;
}

export async function probeDuration(filePath: string, ffprobeBin = 'ffprobe'): Promise<number> {
    const { stdout } = await execa(ffprobeBin, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        filePath,
    ]);
    const duration = Number.parseFloat(stdout.trim());
    return Number.isFinite(duration) ? duration : 0;
}

export class FfmpegExtractor implements MediaExtractor {
    private readonly ffmpegBin: string;
    private readonly ffprobeBin: string;
    private readonly maxFileBytes: number;
    private readonly minDurationSec: number;

    constructor(private readonly opts: FfmpegExtractorOptions) {
        this.ffmpegBin = opts.ffmpegBin || 'ffmpeg';
        this.ffprobeBin = opts.ffprobeBin || 'ffprobe';
        this.maxFileBytes = opts.maxFileBytes ?? 10 * 1024 ** 3;
        this.minDurationSec = opts.minDurationSec ?? 0.1;
    }

    targetPath(inputPath: string): string {
        const key = crypto.createHash('sha256').update(path.resolve(inputPath)).digest('hex').slice(0, 16);
        return path.join(this.opts.outDir, `${key}.wav`);
    }

    private async validate(inputPath: string): Promise<void> {
        if (!isMediaFile(inputPath)) {
            throw new UnsupportedFormatError(`Unsupported format: ${ext(inputPath) || '(none)'}`, { inputPath });
        }
        const stat = await fs.stat(inputPath).catch(() => null);
        if (!stat || !stat.isFile()) {
            throw new ExtractionFailedError(`Not a readable file: ${inputPath}`, { inputPath });
        }
        if (stat.size === 0) {
            throw new ExtractionFailedError('File is empty', { inputPath });
        }
        if (stat.size > this.maxFileBytes) {
            throw new ExtractionFailedError(
                `File too large: ${(stat.size / 1024 ** 3).toFixed(1)}GB (max ${(this.maxFileBytes / 1024 ** 3).toFixed(1)}GB)`,
                { inputPath, size: stat.size }
            );
        }
    }

    async extractAudio(inputPath: string): Promise<string> {
        await this.validate(inputPath);
        const target = this.targetPath(inputPath);
        const tmp = `${target}.${process.pid}.tmp`;
        await fs.ensureDir(this.opts.outDir);
        debug('extract.start', { inputPath, target });
        try {
            await execa(this.ffmpegBin, [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                inputPath,
                '-vn',
                '-sn',
                '-ac',
                '1',
                '-ar',
                '16000',
                '-acodec',
                'pcm_s16le',
                '-f',
                'wav',
                tmp,
            ]);
        } catch (e) {
            await fs.remove(tmp);
            const failure = describeProcessFailure(e);
            throw new ExtractionFailedError(
                `ffmpeg failed for ${path.basename(inputPath)}: ${failure.stderr.trim().slice(-400) || failure.message}`,
                { inputPath, exitCode: failure.exitCode },
                { cause: e }
            );
        }

        let duration: number;
        try {
            duration = await probeDuration(tmp, this.ffprobeBin);
        } catch (e) {
            await fs.remove(tmp);
            throw new ExtractionFailedError(`ffprobe could not read extracted audio for ${path.basename(inputPath)}`, { inputPath }, { cause: e });
        }
        if (duration < this.minDurationSec) {
            await fs.remove(tmp);
            throw new ExtractionFailedError(`Extracted audio too short: ${duration.toFixed(2)}s`, { inputPath, duration });
        }
        await fs.move(tmp, target, { overwrite: true });
        info('extract.done', { inputPath, audioPath: target, duration });
        return target;
    }
}
