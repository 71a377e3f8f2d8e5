import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CHUNK_STRATEGIES, isChunkStrategy } from '../pipeline/chunk';
import { ConfigOverrides, loadConfig, parseFormats } from '../pipeline/env';
import { BatchAbortedError, errorMessage } from '../pipeline/errors';
import { configureLogging } from '../pipeline/log';
import { isModelTier, MODEL_TIERS } from '../pipeline/resources';
import { planBatch, runBatch } from '../pipeline/run';
import { BatchResult } from '../pipeline/types';

const GIB = 1024 ** 3;

function printSummary(result: BatchResult) {
    const failures = Object.entries(result.failed);
    console.log(`\n=== Batch Summary ===`);
    console.log(`Succeeded: ${result.succeeded.length}`);
    console.log(`Failed:    ${failures.length}`);
    console.log(`Skipped:   ${result.skipped.length}`);
    console.log(`Pending:   ${result.pending.length}${result.cancelled ? ' (cancelled)' : ''}`);
    for (const [file, reason] of failures) {
        console.log(` - ${file}: ${reason}`);
    }
}

async function main(): Promise<number> {
    const argv = await yargs(hideBin(process.argv))
        .option('input', { type: 'string', demandOption: true, describe: 'Directory of audio/video files' })
        .option('out', { type: 'string', describe: 'Output directory for documents' })
        .option('model', { type: 'string', choices: ['auto', ...MODEL_TIERS.map((t) => t.tier)] })
        .option('strategy', { type: 'string', choices: [...CHUNK_STRATEGIES] })
        .option('chunk-size', { type: 'number' })
        .option('overlap', { type: 'number' })
        .option('format', { type: 'string', choices: ['md', 'json', 'both'] })
        .option('concurrency', { type: 'number' })
        .option('job-id', { type: 'string' })
        .option('resume', { type: 'boolean', default: true, describe: 'Skip files a previous run completed (--no-resume to start over)' })
        .option('dry-run', { type: 'boolean', default: false })
        .strict()
        .parse();

    const overrides: ConfigOverrides = {
        inputDir: argv.input,
        outDir: argv.out,
        formats: argv.format ? parseFormats(argv.format) : undefined,
        model: argv.model === 'auto' ? 'auto' : argv.model && isModelTier(argv.model) ? argv.model : undefined,
        strategy: argv.strategy && isChunkStrategy(argv.strategy) ? argv.strategy : undefined,
        targetSize: argv['chunk-size'],
        overlap: argv.overlap,
        concurrency: argv.concurrency,
        jobId: argv['job-id'],
        resume: argv.resume,
        dryRun: argv['dry-run'],
    };
    const config = loadConfig(process.env, overrides);
    configureLogging({ level: config.logLevel, format: config.logFormat, file: config.logFile || undefined });

    if (config.dryRun) {
        const plan = await planBatch(config);
        console.log(`Job:          ${plan.jobId}`);
        console.log(`Memory:       ${(plan.availableMemoryBytes / GIB).toFixed(1)} GiB free, ${plan.cpuCount} CPUs`);
        console.log(`Model tier:   ${plan.tier}`);
        console.log(`Concurrency:  ${plan.concurrency} (memory allows ${plan.maxConcurrency})`);
        console.log(`Files:        ${plan.files.length} found, ${plan.queued.length} to process`);
        for (const file of plan.queued) console.log(` - ${file}`);
        return 0;
    }

    const controller = new AbortController();
    process.on('SIGINT', () => {
        if (controller.signal.aborted) process.exit(130);
        console.error('\nCancelling: finishing in-flight files (Ctrl-C again to quit now)');
        controller.abort();
    });

    try {
        const { result } = await runBatch(config, { signal: controller.signal });
        printSummary(result);
        return Object.keys(result.failed).length > 0 ? 1 : 0;
    } catch (e) {
        if (e instanceof BatchAbortedError) {
            console.error(`Batch aborted: ${errorMessage(e.cause ?? e)}`);
            printSummary(e.result);
            return 2;
        }
        throw e;
    }
}

main()
    .then((code) => process.exit(code))
    .catch((e) => {
        console.error(e);
        process.exit(1);
    });
