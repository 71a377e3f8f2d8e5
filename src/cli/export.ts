import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import fs from "fs-extra";
import path from "path";
import { parseFormats } from "../pipeline/env";
import { OUTPUT_EXTENSIONS, readDocument, serializeDocument } from "../pipeline/export";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("in", { type: "string", demandOption: true, describe: "Document (.md or .json)" })
    .option("to", { type: "string", choices: ["md", "json"], demandOption: true })
    .option("out", { type: "string", describe: "Target file; defaults to the input with the new extension" })
    .strict()
    .parse();

  const [format] = parseFormats(argv.to);
  const doc = await readDocument(argv.in);
  const inPath = path.resolve(argv.in);
  const outPath = path.resolve(
    argv.out ?? path.join(path.dirname(inPath), path.basename(inPath, path.extname(inPath)) + OUTPUT_EXTENSIONS[format])
  );
  await fs.outputFile(outPath, serializeDocument(doc, format));
  console.log("Document:", outPath);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
