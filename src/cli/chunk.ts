import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { buildDocument } from "../pipeline/assemble";
import { CHUNK_STRATEGIES, isChunkStrategy } from "../pipeline/chunk";
import { loadConfig, parseFormats } from "../pipeline/env";
import { FileDocumentSink } from "../pipeline/export";
import { toSourceId } from "../pipeline/ids";
import { sourceTypeOf } from "../pipeline/ingest";
import { configureLogging } from "../pipeline/log";
import { readRunnerOutput } from "../pipeline/transcribe";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("transcript", { type: "string", demandOption: true, describe: "Runner JSON output" })
    .option("file", { type: "string", demandOption: true, describe: "Source media the transcript belongs to" })
    .option("out", { type: "string" })
    .option("model", { type: "string", default: "unknown" })
    .option("strategy", { type: "string", choices: [...CHUNK_STRATEGIES] })
    .option("chunk-size", { type: "number" })
    .option("overlap", { type: "number" })
    .option("format", { type: "string", choices: ["md", "json", "both"] })
    .strict()
    .parse();

  const config = loadConfig(process.env, {
    outDir: argv.out,
    formats: argv.format ? parseFormats(argv.format) : undefined,
    strategy: argv.strategy && isChunkStrategy(argv.strategy) ? argv.strategy : undefined,
    targetSize: argv["chunk-size"],
    overlap: argv.overlap,
  });
  configureLogging({ level: config.logLevel, format: config.logFormat });

  const filePath = path.resolve(argv.file);
  const transcript = await readRunnerOutput(argv.transcript);
  const doc = buildDocument(
    {
      filePath,
      sourceType: sourceTypeOf(filePath),
      duration: transcript.sourceDuration,
      model: argv.model,
      language: transcript.language,
      transcribedAt: new Date().toISOString(),
      strategy: config.chunking.strategy,
    },
    transcript,
    {
      chunking: { ...config.chunking, idPrefix: toSourceId(filePath) },
      metadata: { topK: config.topK, minTopicOverlap: config.minTopicOverlap },
      reviewThreshold: config.reviewThreshold,
    }
  );
  const sink = new FileDocumentSink({ outDir: config.outDir, formats: config.formats });
  const written = await sink.write(doc);
  console.log(`Chunks: ${doc.chunks.length}`);
  for (const p of written) console.log(" -", p);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
