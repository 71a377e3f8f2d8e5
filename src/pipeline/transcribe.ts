import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { describeProcessFailure, errorMessage, ModelLoadError, TranscriptionFailedError } from './errors';
import { debug, info, warn } from './log';
import { ModelTier, Segment, Transcript } from './types';

export interface TranscriptionPort {
    transcribe(audioPath: string, tier: ModelTier): Promise<Transcript>;
}

export interface WhisperxOptions {
    /** Docker image with the runner; when empty the local binary is used */
    image?: string;
    dockerBin?: string;
    /** Runner executable for local mode */
    localBin?: string;
    /** Extra `docker run` arguments, e.g. device flags */
    dockerArgs?: readonly string[];
    /** Passed to the container with --env-file when it exists */
    envFile?: string;
    skipHealthCheck?: boolean;
    /** Kill a runner that takes longer than this. 0 disables. */
    timeoutMs?: number;
}

const MODEL_LOAD_PATTERN = /failed to load model|out of memory|cannot allocate memory/i;

function record(v: unknown): Record<string, unknown> | null {
    return typeof v === 'object' && v !== null && !Array.isArray(v) ? Object.fromEntries(Object.entries(v)) : null;
}

function numberField(r: Record<string, unknown>, ...keys: string[]): number | undefined {
    for (const k of keys) {
        const v = r[k];
        if (typeof v === 'number' && Number.isFinite(v)) return v;
    }
    return undefined;
}

function clamp01(n: number): number {
    return Math.min(1, Math.max(0, n));
}

/**
 * Runner JSON to a Transcript. Confidence comes from `confidence`, else
 * `exp(avg_logprob)`, else 1. Segments are ordered by start time.
 */
export function parseRunnerOutput(raw: unknown): Transcript {
    const doc = record(raw);
    if (!doc || !Array.isArray(doc.segments)) {
        throw new TranscriptionFailedError('Runner output has no segments array');
    }
    const segments: Segment[] = [];
    doc.segments.forEach((item: unknown, i: number) => {
        const s = record(item);
        if (!s) throw new TranscriptionFailedError(`Runner segment ${i} is not an object`);
        const start = numberField(s, 'start', 'startSec') ?? 0;
        const end = Math.max(start, numberField(s, 'end', 'endSec') ?? start);
        const logprob = numberField(s, 'avg_logprob', 'avgLogprob');
        const confidence = numberField(s, 'confidence') ?? (logprob !== undefined ? Math.exp(logprob) : 1);
        segments.push({
            start,
            end,
            text: typeof s.text === 'string' ? s.text : '',
            confidence: clamp01(confidence),
        });
    });
    segments.sort((a, b) => a.start - b.start);
    const lastEnd = segments.reduce((m, s) => Math.max(m, s.end), 0);
    return {
        segments,
        language: typeof doc.language === 'string' && doc.language ? doc.language : 'unknown',
        sourceDuration: numberField(doc, 'duration', 'durationSec') ?? lastEnd,
    };
}

export async function readRunnerOutput(filePath: string): Promise<Transcript> {
    let raw: unknown;
    try {
        raw = await fs.readJson(filePath);
    } catch (e) {
        throw new TranscriptionFailedError(`Runner output unreadable: ${errorMessage(e)}`, { filePath }, { cause: e });
    }
    return parseRunnerOutput(raw);
}

/**
 * Runs the WhisperX runner in a container or as a local process.
 */
export class WhisperxTranscriber implements TranscriptionPort {
    private ready: Promise<void> | null = null;

    constructor(private readonly opts: WhisperxOptions = {}) {}

    get mode(): 'docker' | 'local' {
        return this.opts.image ? 'docker' : 'local';
    }

    private async command(runnerArgs: string[], mounts: string[]): Promise<[string, string[]]> {
        const image = this.opts.image;
        if (!image) return [this.opts.localBin || 'whisperx-runner', runnerArgs];
        const envFile = this.opts.envFile ? path.resolve(this.opts.envFile) : '';
        const args = [
            'run',
            '--rm',
            ...(this.opts.dockerArgs ?? []),
            ...(envFile && (await fs.pathExists(envFile)) ? ['--env-file', envFile] : []),
            ...[...new Set(mounts)].flatMap((dir) => ['-v', `${dir}:${dir}`]),
            image,
            ...runnerArgs,
        ];
        return [this.opts.dockerBin || 'docker', args];
    }

    /** Image present and runner healthy; checked once per instance */
    preflight(): Promise<void> {
        if (!this.ready) this.ready = this.checkRunner();
        return this.ready;
    }

    private async checkRunner(): Promise<void> {
        const image = this.opts.image;
        if (image) {
            try {
                await execa(this.opts.dockerBin || 'docker', ['image', 'inspect', image]);
            } catch (e) {
                throw new ModelLoadError(`Docker image ${image} not found locally. Build it first.`, { image }, { cause: e });
            }
        }
        if (this.opts.skipHealthCheck) {
            info('transcribe.health.skip', { mode: this.mode });
            return;
        }
        const [cmd, args] = await this.command(['--health'], []);
        try {
            const { stdout } = await execa(cmd, args);
            info('transcribe.health', { mode: this.mode, raw: stdout.trim().slice(0, 200) });
        } catch (e) {
            const failure = describeProcessFailure(e);
            warn('transcribe.health.fail', {
                exitCode: failure.exitCode,
                stderrSnippet: failure.stderr.slice(-800),
            });
            throw new ModelLoadError(
                `Transcription runner failed its health check (exit ${failure.exitCode ?? 'unknown'})`,
                { mode: this.mode },
                { cause: e }
            );
        }
    }

    async transcribe(audioPath: string, tier: ModelTier): Promise<Transcript> {
        await this.preflight();
        const audio = path.resolve(audioPath);
        const outPath = path.join(path.dirname(audio), `${path.basename(audio, path.extname(audio))}.${tier}.transcript.json`);
        const [cmd, args] = await this.command(['--model', tier, audio, outPath], [path.dirname(audio)]);
        const timeout = this.opts.timeoutMs && this.opts.timeoutMs > 0 ? this.opts.timeoutMs : undefined;

        try {
            const proc = execa(cmd, args, { all: true, timeout });
            proc.all?.on('data', (d: Buffer) => {
                const line = d.toString().trim();
                if (line) debug('transcribe.runner.log', { audioPath: audio, line });
            });
            await proc;
        } catch (e) {
            const failure = describeProcessFailure(e);
            const details = { audioPath: audio, tier, exitCode: failure.exitCode, stderrSnippet: failure.stderr.slice(-400) };
            if (MODEL_LOAD_PATTERN.test(failure.stderr)) {
                throw new ModelLoadError(`Model ${tier} could not be loaded`, details, { cause: e });
            }
            throw new TranscriptionFailedError(`Runner failed: ${failure.message}`, details, { cause: e });
        }

        try {
            return await readRunnerOutput(outPath);
        } finally {
            await fs.remove(outPath);
        }
    }
}
