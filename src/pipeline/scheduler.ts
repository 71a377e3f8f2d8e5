import { ConfigError, errorMessage, InvariantViolationError, ModelLoadError, PipelineError, BatchAbortedError } from './errors';
import { JobLedger, LedgerStatus } from './ledger';
import { error, info, startStep, warn } from './log';
import { backoffDelay, DEFAULT_RETRY_POLICY, RetryPolicy, sleep } from './retry';
import { TranscriptionPort } from './transcribe';
import { BatchJob, BatchResult, FileState, ModelTier, Transcript, TranscriptDocument } from './types';

const TRANSITIONS: Record<FileState, readonly FileState[]> = {
    pending: ['extracting', 'failed'],
    extracting: ['transcribing', 'failed'],
    // transcribing -> transcribing is a retry
    transcribing: ['transcribing', 'chunking', 'failed'],
    chunking: ['done', 'failed'],
    done: [],
    failed: [],
};

export function canTransition(from: FileState, to: FileState): boolean {
    return TRANSITIONS[from].includes(to);
}

/** Lifecycle of one file inside a run */
export class FileTracker {
    state: FileState = 'pending';
    attempts = 0;

    constructor(readonly filePath: string) {}

    to(next: FileState): void {
        if (!canTransition(this.state, next)) {
            throw new InvariantViolationError(`Illegal transition ${this.state} -> ${next}`, {
                filePath: this.filePath,
            });
        }
        if (next === 'transcribing') this.attempts += 1;
        this.state = next;
    }
}

export interface SchedulerDeps {
    /** Resolves to the audio to transcribe, usually through the cache */
    extract(filePath: string): Promise<string>;
    transcriber: TranscriptionPort;
    build(filePath: string, transcript: Transcript): TranscriptDocument;
    /** Called for each finished document before the file counts as done */
    sink?(doc: TranscriptDocument): Promise<unknown>;
    ledger?: JobLedger;
}

export interface SchedulerOptions {
    tier: ModelTier;
    retry?: Partial<RetryPolicy>;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

class LedgerWriteError extends PipelineError {
    constructor(filePath: string, cause: unknown) {
        super(`Ledger write failed after ${filePath}: ${errorMessage(cause)}`, 'batch_aborted', true, { filePath }, { cause });
        this.name = 'LedgerWriteError';
    }
}

/**
 * Worker pool over a BatchJob. Per-file failures are recorded and the batch
 * continues; a model load or ledger failure stops it.
 */
export class BatchScheduler {
    private readonly policy: RetryPolicy;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private readonly trackers = new Map<string, FileTracker>();

    constructor(
        private readonly deps: SchedulerDeps,
        private readonly opts: SchedulerOptions
    ) {
        this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
        if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
            throw new ConfigError(`maxAttempts must be a positive integer, got ${this.policy.maxAttempts}`);
        }
        this.sleep = opts.sleep ?? sleep;
        this.random = opts.random ?? Math.random;
    }

    stateOf(filePath: string): FileState | undefined {
        return this.trackers.get(filePath)?.state;
    }

    attemptsOf(filePath: string): number {
        return this.trackers.get(filePath)?.attempts ?? 0;
    }

    async run(job: BatchJob, concurrency: number, signal?: AbortSignal): Promise<BatchResult> {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
        }
        const skipped = job.files.filter((f) => job.completed.has(f));
        const queue = job.files.filter((f) => !job.completed.has(f));
        const retrying = queue.filter((f) => job.failed.has(f));
        for (const f of retrying) job.failed.delete(f);

        const docs = new Map<string, TranscriptDocument>();
        const total = queue.length;
        let finished = 0;
        let abortCause: unknown = null;
        const timer = startStep('batch.run', {
            jobId: job.id,
            files: job.files.length,
            skipped: skipped.length,
            retrying: retrying.length,
            concurrency,
            tier: this.opts.tier,
        });

        const worker = async (workerId: number) => {
            while (abortCause === null && !signal?.aborted) {
                const filePath = queue.shift();
                if (filePath === undefined) return;
                try {
                    await this.processFile(job, filePath, docs, workerId);
                } catch (e) {
                    // Only systemic failures reach here
                    abortCause = abortCause ?? e;
                }
                finished += 1;
                timer.eta(finished, total);
            }
        };

        await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(1, total)) }, (_, i) => worker(i)));

        const result: BatchResult = {
            succeeded: job.files.flatMap((f) => {
                const doc = docs.get(f);
                return doc ? [doc] : [];
            }),
            failed: Object.fromEntries(job.failed),
            skipped,
            pending: [...queue],
            cancelled: signal?.aborted ?? false,
        };
        timer.end({
            succeeded: result.succeeded.length,
            failed: Object.keys(result.failed).length,
            pending: result.pending.length,
            cancelled: result.cancelled,
        });

        if (abortCause !== null) {
            error('batch.aborted', { jobId: job.id, error: errorMessage(abortCause), pending: result.pending.length });
            throw new BatchAbortedError(`Batch ${job.id} aborted: ${errorMessage(abortCause)}`, result, {
                cause: abortCause,
            });
        }
        return result;
    }

    private async processFile(
        job: BatchJob,
        filePath: string,
        docs: Map<string, TranscriptDocument>,
        workerId: number
    ): Promise<void> {
        const tracker = new FileTracker(filePath);
        this.trackers.set(filePath, tracker);
        job.inProgress.add(filePath);
        info('batch.file.start', { filePath, workerId });
        try {
            tracker.to('extracting');
            const audioPath = await this.deps.extract(filePath);
            tracker.to('transcribing');
            const transcript = await this.transcribeWithRetry(tracker, audioPath);
            tracker.to('chunking');
            const doc = this.deps.build(filePath, transcript);
            if (this.deps.sink) await this.deps.sink(doc);
            tracker.to('done');
            job.completed.add(filePath);
            docs.set(filePath, doc);
            info('batch.file.done', { filePath, chunks: doc.chunks.length, attempts: tracker.attempts });
        } catch (e) {
            const reason = errorMessage(e);
            if (tracker.state !== 'failed') tracker.to('failed');
            job.failed.set(filePath, reason);
            warn('batch.file.fail', {
                filePath,
                attempts: tracker.attempts,
                code: e instanceof PipelineError ? e.code : undefined,
                error: reason,
            });
            await this.persist(filePath, 'failed', tracker.attempts, reason);
            if (e instanceof ModelLoadError) throw e;
            return;
        } finally {
            job.inProgress.delete(filePath);
        }
        await this.persist(filePath, 'done', tracker.attempts);
    }

    private async persist(filePath: string, status: LedgerStatus, attempts: number, reason?: string): Promise<void> {
        if (!this.deps.ledger) return;
        try {
            await this.deps.ledger.record({ path: filePath, status, attempts, reason });
        } catch (e) {
            throw new LedgerWriteError(filePath, e);
        }
    }

    private async transcribeWithRetry(tracker: FileTracker, audioPath: string): Promise<Transcript> {
        for (;;) {
            try {
                return await this.deps.transcriber.transcribe(audioPath, this.opts.tier);
            } catch (e) {
                const permanent = e instanceof PipelineError && e.permanent;
                if (permanent || tracker.attempts >= this.policy.maxAttempts) throw e;
                const delayMs = Math.round(backoffDelay(tracker.attempts, this.policy, this.random));
                warn('batch.transcribe.retry', {
                    filePath: tracker.filePath,
                    attempt: tracker.attempts,
                    delayMs,
                    error: errorMessage(e),
                });
                await this.sleep(delayMs);
                tracker.to('transcribing');
            }
        }
    }
}
