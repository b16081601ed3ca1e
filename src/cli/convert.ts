import fs from "fs-extra";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { captionFormatFrom } from "../pipeline/config";
import { ConfigurationError } from "../pipeline/errors";
import { errorMessage, error, info } from "../pipeline/log";
import { detectFormat, parseCaptions, renderCaptions } from "../pipeline/render";
import { CAPTION_FORMATS } from "../pipeline/types";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", demandOption: true, describe: "Existing .srt or .vtt file" })
    .option("to", { type: "string", choices: CAPTION_FORMATS, demandOption: true })
    .option("out", { type: "string", describe: "Output path (default: input with the new extension)" })
    .parse();

  const from = detectFormat(argv.input);
  if (!from) {
    throw new ConfigurationError(`Cannot tell caption format from ${argv.input}`, { input: argv.input });
  }
  const to = captionFormatFrom(argv.to);
  const cues = parseCaptions(await fs.readFile(argv.input, "utf8"), from);
  const out = argv.out ?? argv.input.replace(/\.[^.]+$/, `.${to}`);
  if (path.resolve(out) === path.resolve(argv.input)) {
    throw new ConfigurationError("Refusing to overwrite the input file; pass --out", { out });
  }
  await fs.writeFile(out, renderCaptions(cues, to), "utf8");
  info("convert.done", { from, to, cues: cues.length, out: path.resolve(out) });
}

main().catch((e) => {
  error("convert.fail", { error: errorMessage(e) });
  process.exit(1);
});
