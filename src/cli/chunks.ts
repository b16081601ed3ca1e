import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { chunkDuration, planChunks } from "../pipeline/chunk";
import { ENV } from "../pipeline/env";
import { errorMessage, error } from "../pipeline/log";
import { FfmpegMediaExtractor } from "../pipeline/media";
import { formatTimestamp } from "../pipeline/render";

// Prints the chunk plan a caption job would use, without calling any model.
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", describe: "Media file to probe" })
    .option("duration", { type: "number", describe: "Duration in seconds instead of probing" })
    .option("chunk-sec", { type: "number", default: ENV.chunkSec })
    .option("overlap-sec", { type: "number", default: ENV.overlapSec })
    .option("json", { type: "boolean", default: false })
    .check((a) => a.input !== undefined || a.duration !== undefined || "Provide --input or --duration")
    .parse();

  const durationSec =
    argv.duration ?? (await new FfmpegMediaExtractor().probeDuration(String(argv.input)));
  const chunks = planChunks(durationSec, { chunkSec: argv["chunk-sec"], overlapSec: argv["overlap-sec"] });

  if (argv.json) {
    console.log(JSON.stringify({ durationSec, chunks }, null, 2));
    return;
  }
  console.log(`Duration ${durationSec}s -> ${chunks.length} chunks`);
  for (const c of chunks) {
    console.log(
      ` #${c.index}  ${formatTimestamp(c.globalStart, ".")} - ${formatTimestamp(c.globalEnd, ".")}  (${chunkDuration(c)}s)`
    );
  }
}

main().catch((e) => {
  error("chunks.fail", { error: errorMessage(e) });
  process.exit(1);
});
