import fs from "fs-extra";
import path from "path";
import { buildDocument } from "./assemble";
import { AudioCache } from "./cache";
import { PipelineConfig } from "./env";
import { ConfigError } from "./errors";
import { DocumentSink, FileDocumentSink } from "./export";
import { toJobId, toSourceId } from "./ids";
import { FfmpegExtractor, listMediaFiles, MediaExtractor, sourceTypeOf } from "./ingest";
import { createBatchJob, FileLedgerStore, JobLedger, LedgerStore, PgLedgerStore } from "./ledger";
import { closeLogFile, info, setLogFile } from "./log";
import { ResourceMonitor, ResourcePlan } from "./resources";
import { BatchScheduler } from "./scheduler";
import { TranscriptionPort, WhisperxTranscriber } from "./transcribe";
import { BatchJob, BatchResult, Transcript, TranscriptDocument } from "./types";

export interface RunDeps {
  monitor?: ResourceMonitor;
  extractor?: MediaExtractor;
  transcriber?: TranscriptionPort;
  ledgerStore?: LedgerStore;
  sink?: DocumentSink;
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchPlan extends ResourcePlan {
  jobId: string;
  files: string[];
  /** Files the run will process; completed ones from an earlier run are left out */
  queued: string[];
}

export interface BatchRun {
  plan: BatchPlan;
  result: BatchResult;
}

function ledgerStoreFor(config: PipelineConfig): LedgerStore {
  return config.ledger === "pg"
    ? new PgLedgerStore(config.databaseUrl)
    : new FileLedgerStore(config.stateDir);
}

async function prepare(
  config: PipelineConfig,
  deps: RunDeps
): Promise<{ plan: BatchPlan; job: BatchJob; ledger: JobLedger }> {
  if (!(await fs.pathExists(config.inputDir))) {
    throw new ConfigError(`Input directory not found: ${config.inputDir}`);
  }
  const files = await listMediaFiles(config.inputDir);
  const jobId = config.jobId ?? toJobId(config.inputDir);

  const ledger = new JobLedger(deps.ledgerStore ?? ledgerStoreFor(config), jobId);
  if (config.resume) {
    await ledger.load();
  } else if (!config.dryRun) {
    await ledger.reset();
  }
  const job = createBatchJob(jobId, files, config.resume ? ledger.all() : []);

  const monitor = deps.monitor ?? new ResourceMonitor();
  const resources = monitor.plan({
    tier: config.model,
    concurrency: config.concurrency,
    safetyMargin: config.safetyMargin,
    safetyFactor: config.safetyFactor,
  });
  const plan: BatchPlan = {
    ...resources,
    jobId,
    files,
    queued: files.filter((f) => !job.completed.has(f)),
  };
  info("batch.plan", {
    jobId,
    files: files.length,
    queued: plan.queued.length,
    tier: plan.tier,
    concurrency: plan.concurrency,
    maxConcurrency: plan.maxConcurrency,
    availableMemoryBytes: plan.availableMemoryBytes,
    cpuCount: plan.cpuCount,
  });
  return { plan, job, ledger };
}

/** Resource plan and file list without touching any media */
export async function planBatch(config: PipelineConfig, deps: RunDeps = {}): Promise<BatchPlan> {
  return (await prepare({ ...config, dryRun: true }, deps)).plan;
}

export async function runBatch(config: PipelineConfig, deps: RunDeps = {}): Promise<BatchRun> {
  const { plan, job, ledger } = await prepare(config, deps);
  if (config.dryRun) {
    return {
      plan,
      result: { succeeded: [], failed: {}, skipped: [...job.completed], pending: plan.queued, cancelled: false },
    };
  }

  const runLogPath = path.join(config.stateDir, `${plan.jobId}-${Date.now()}.log`);
  if (!config.logFile) setLogFile(runLogPath);

  const cache = new AudioCache(config.cacheDir);
  const extractor =
    deps.extractor ??
    new FfmpegExtractor({
      outDir: cache.artifactDir,
      ffmpegBin: config.ffmpegBin,
      ffprobeBin: config.ffprobeBin,
      maxFileBytes: config.maxFileBytes,
    });
  const transcriber = deps.transcriber ?? new WhisperxTranscriber(config.runner);
  const sink =
    deps.sink ??
    new FileDocumentSink({ outDir: config.outDir, formats: config.formats, inputRoot: config.inputDir });
  const now = deps.now ?? (() => new Date());

  const build = (filePath: string, transcript: Transcript): TranscriptDocument =>
    buildDocument(
      {
        filePath,
        sourceType: sourceTypeOf(filePath),
        duration: transcript.sourceDuration,
        model: plan.tier,
        language: transcript.language,
        transcribedAt: now().toISOString(),
        strategy: config.chunking.strategy,
      },
      transcript,
      {
        chunking: { ...config.chunking, idPrefix: toSourceId(filePath) },
        metadata: { topK: config.topK, minTopicOverlap: config.minTopicOverlap },
        reviewThreshold: config.reviewThreshold,
      }
    );

  const scheduler = new BatchScheduler(
    {
      extract: async (filePath) => {
        const { audioPath, hit } = await cache.acquire(filePath, (p) => extractor.extractAudio(p));
        info("batch.file.audio", { filePath, audioPath, cacheHit: hit });
        return audioPath;
      },
      transcriber,
      build,
      sink: (doc) => sink.write(doc),
      ledger,
    },
    { tier: plan.tier, retry: config.retry, sleep: deps.sleep }
  );

  try {
    const result = await scheduler.run(job, plan.concurrency, deps.signal);
    info("batch.complete", {
      jobId: plan.jobId,
      succeeded: result.succeeded.length,
      failed: Object.keys(result.failed).length,
      skipped: result.skipped.length,
      pending: result.pending.length,
      cancelled: result.cancelled,
      failures: result.failed,
    });
    return { plan, result };
  } finally {
    if (!config.logFile) closeLogFile();
  }
}
