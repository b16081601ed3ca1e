import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { captionFormatFrom } from "../pipeline/config";
import { ENV } from "../pipeline/env";
import { errorMessage, error, info, isLogLevel, setLogLevel } from "../pipeline/log";
import { runCaptionJob } from "../pipeline/run";
import { CAPTION_FORMATS } from "../pipeline/types";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", demandOption: true, describe: "Video or audio file to caption" })
    .option("format", { type: "string", choices: CAPTION_FORMATS, default: ENV.captionFormat })
    .option("out-dir", { type: "string", describe: "Job directory (default ARTIFACTS_ROOT/<name>)" })
    .option("chunk-sec", { type: "number", default: ENV.chunkSec })
    .option("optimize", { type: "boolean", default: ENV.optimize, describe: "Run the timing pass" })
    .option("persist-chunks", { type: "boolean", default: ENV.persistChunks })
    .option("partial", {
      type: "boolean",
      default: false,
      describe: "On Ctrl-C, render what has been transcribed so far",
    })
    .option("level", { type: "string", default: ENV.logLevel })
    .parse();

  if (isLogLevel(argv.level)) setLogLevel(argv.level);
  const format = captionFormatFrom(argv.format);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    info("caption.sigint", { partial: argv.partial });
    controller.abort();
  });

  const out = await runCaptionJob(argv.input, {
    format,
    outDir: argv["out-dir"],
    config: { chunkSec: argv["chunk-sec"], optimize: argv.optimize },
    persistChunks: argv["persist-chunks"],
    partial: argv.partial,
    signal: controller.signal,
  });

  const { diagnostics, usage } = out.result;
  console.log("Artifacts:");
  console.log(" - captions:", out.captionsPath);
  console.log(" - usage:", out.usagePath);
  console.log(
    `Segments: ${out.result.segments.length}  chunks failed: ${diagnostics.failedChunks.length}/${diagnostics.chunks}  ` +
      `gaps: ${diagnostics.gapsDetected}  optimizer: ${diagnostics.optimizer}${out.result.partial ? "  (partial)" : ""}`
  );
  console.log(`Tokens: ${usage.total.promptTokens} in / ${usage.total.completionTokens} out`);
}

main().catch((e) => {
  error("caption.fail", { error: errorMessage(e) });
  process.exit(1);
});
