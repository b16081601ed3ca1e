import fs from "fs-extra";
import path from "path";
import { ArtifactAudit } from "./audit";
import { type CaptionConfig, captionConfigFromEnv } from "./config";
import { CaptionEngine, type CaptionJobResult } from "./engine";
import { ENV } from "./env";
import { closeLogFile, errorMessage, info, setLogFile, warn } from "./log";
import { FfmpegMediaExtractor, type MediaExtractor, extractAudioTrack } from "./media";
import { OpenAIAudioService } from "./openai_service";
import { finishRun, insertRun, withPg, redactUrl, type RunStatus } from "./run_db";
import type { AudioUnderstandingService } from "./service";
import type { CaptionFormat } from "./types";

export interface RunCaptionOptions {
  format: CaptionFormat;
  /** Job directory; defaults to ARTIFACTS_ROOT/<input basename> */
  outDir?: string;
  config?: Partial<CaptionConfig>;
  persistChunks?: boolean;
  signal?: AbortSignal;
  partial?: boolean;
  service?: AudioUnderstandingService;
  extractor?: MediaExtractor;
}

export interface RunCaptionResult {
  jobDir: string;
  audioPath: string;
  captionsPath: string;
  usagePath: string;
  result: CaptionJobResult;
}

export function jobIdFor(inputPath: string): string {
  return path.basename(inputPath).replace(/\.[^.]+$/, "") || "video";
}

async function recordStart(jobId: string, inputPath: string, format: string, chunkSec: number) {
  try {
    return (await withPg((c) => insertRun(c, jobId, inputPath, format, chunkSec))) ?? null;
  } catch (e) {
    warn("run.db.init.fail", { error: errorMessage(e), dbUrl: redactUrl(ENV.databaseUrl) });
    return null;
  }
}

async function recordEnd(runId: string | null, status: RunStatus, report: Parameters<typeof finishRun>[3]) {
  if (!runId) return;
  try {
    await withPg((c) => finishRun(c, runId, status, report));
  } catch (e) {
    warn("run.db.finish.fail", { runId, error: errorMessage(e) });
  }
}

/**
 * One captioning job for a local media file: extract its audio once, run the engine,
 * and write `captions.<fmt>` plus `usage.json` into the job directory.
 */
export async function runCaptionJob(inputPath: string, opts: RunCaptionOptions): Promise<RunCaptionResult> {
  const jobId = jobIdFor(inputPath);
  const jobDir = path.resolve(opts.outDir ?? path.join(ENV.artifactsRoot, jobId));
  await fs.ensureDir(jobDir);
  setLogFile(path.join(jobDir, `run-${Date.now()}.log`));

  const config: CaptionConfig = { ...captionConfigFromEnv(ENV), ...opts.config };
  const startTs = Date.now();
  const runId = await recordStart(jobId, inputPath, opts.format, config.chunkSec);
  info("run.start", { jobId, runId, jobDir, format: opts.format });

  try {
    const audioPath = await extractAudioTrack(inputPath, path.join(jobDir, "audio.wav"));
    const engine = new CaptionEngine({
      service:
        opts.service ??
        new OpenAIAudioService({
          apiKey: ENV.openaiApiKey,
          baseURL: ENV.openaiBaseUrl,
          audioModel: ENV.captionModel,
          textModel: ENV.optimizeModel,
        }),
      extractor: opts.extractor ?? new FfmpegMediaExtractor(),
      config,
      audit: new ArtifactAudit(jobDir, { audio: opts.persistChunks ?? ENV.persistChunks }),
    });
    const result = await engine.run({
      sourcePath: audioPath,
      format: opts.format,
      signal: opts.signal,
      partial: opts.partial,
    });

    const captionsPath = path.join(jobDir, `captions.${opts.format}`);
    await fs.writeFile(captionsPath, result.document, "utf8");
    const usagePath = path.join(jobDir, "usage.json");
    await fs.writeJson(usagePath, { usage: result.usage, diagnostics: result.diagnostics }, { spaces: 2 });

    await recordEnd(runId, result.partial ? "partial" : "completed", {
      usage: result.usage,
      diagnostics: result.diagnostics,
    });
    info("run.complete", { jobId, runId, durationMs: Date.now() - startTs, captionsPath });
    return { jobDir, audioPath, captionsPath, usagePath, result };
  } catch (e) {
    await recordEnd(runId, "failed", { error: errorMessage(e) });
    throw e;
  } finally {
    closeLogFile();
  }
}
