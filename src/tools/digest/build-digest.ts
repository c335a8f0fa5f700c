import { cfg, loadConfig, printConfigSnapshot } from "../../config/env.js";
import type { SummaryStyle } from "../../config/types.js";
import { createDigestPipeline } from "../../digest/pipeline.js";
import type { ProgressEvent } from "../../digest/types.js";
import { getTextGenerator, getTextGeneratorInfo } from "../../llm/provider.js";
import { CaptionFileSource } from "../../transcripts/captionFile.js";
import { extractContentId } from "../../transcripts/contentId.js";
import { TranscriptUnavailableError } from "../../transcripts/types.js";
import { log } from "../../utils/logger.js";
import { buildDigestMeta, readTranscriptInput, writeDigestOutputs } from "./io.js";

const cliLog = log.withScope("cli");

type Args = {
  inputPath: string | null;
  content: string | null;
  label: string | null;
  captionsDir: string;
  languages: string[];
  style: SummaryStyle;
  model: string;
  maxWords: number;
  concurrency: number;
  outputDir: string;
  noWrite: boolean;
  printConfig: boolean;
};

function parseArgs(): Args {
  const argv = process.argv.slice(2);

  let inputPath: string | null = null;
  let content: string | null = null;
  let label: string | null = null;
  let captionsDir = cfg.transcripts.captionsDir;
  let languages = cfg.transcripts.preferredLanguages;
  let style: SummaryStyle = cfg.digest.style;
  let model = cfg.llm.model;
  let maxWords = cfg.digest.maxWordsPerChunk;
  let concurrency = cfg.digest.concurrency;
  let outputDir = cfg.output.dir;
  let noWrite = false;
  let printConfig = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    if (arg === "--input" && next) {
      inputPath = next;
      i++;
    } else if (arg === "--content" && next) {
      content = next;
      i++;
    } else if (arg === "--label" && next) {
      label = next;
      i++;
    } else if (arg === "--captions_dir" && next) {
      captionsDir = next;
      i++;
    } else if (arg === "--languages" && next) {
      languages = next.split(",").map((s) => s.trim()).filter(Boolean);
      i++;
    } else if (arg === "--style" && next) {
      if (next === "detailed" || next === "balanced" || next === "concise") {
        style = next;
      } else {
        throw new Error(`Invalid --style '${next}'. Expected detailed|balanced|concise.`);
      }
      i++;
    } else if (arg === "--model" && next) {
      model = next;
      i++;
    } else if (arg === "--max_words" && next) {
      maxWords = Number(next);
      i++;
    } else if (arg === "--concurrency" && next) {
      concurrency = Number(next);
      i++;
    } else if (arg === "--out" && next) {
      outputDir = next;
      i++;
    } else if (arg === "--no_write") {
      noWrite = true;
    } else if (arg === "--print_config") {
      printConfig = true;
    }
  }

  if (!inputPath && !content) {
    throw new Error("Missing input: pass --input <transcript.txt> or --content <video URL or id>");
  }
  if (inputPath && content) {
    throw new Error("Cannot combine --input with --content");
  }
  if (!Number.isFinite(maxWords) || maxWords < 1) {
    throw new Error(`Invalid --max_words '${maxWords}'`);
  }
  if (!Number.isFinite(concurrency) || concurrency < 1) {
    throw new Error(`Invalid --concurrency '${concurrency}'`);
  }

  return {
    inputPath,
    content,
    label,
    captionsDir,
    languages: languages.length > 0 ? languages : cfg.transcripts.preferredLanguages,
    style,
    model,
    maxWords: Math.floor(maxWords),
    concurrency: Math.floor(concurrency),
    outputDir,
    noWrite,
    printConfig,
  };
}

async function loadTranscript(args: Args): Promise<{ contentId: string; source: string; text: string }> {
  if (args.inputPath) {
    return {
      contentId: args.label ?? args.inputPath.replace(/^.*[\\/]/, "").replace(/\.[^.]+$/, ""),
      source: args.inputPath,
      text: readTranscriptInput(args.inputPath),
    };
  }

  const raw = args.content ?? "";
  const contentId = extractContentId(raw);
  if (!contentId) {
    throw new Error(`Could not find a video id in '${raw}'`);
  }

  const source = new CaptionFileSource(args.captionsDir, args.languages);
  return { contentId: args.label ?? contentId, source: raw, text: await source.fetchTranscript(contentId) };
}

function renderProgress(event: ProgressEvent): void {
  switch (event.type) {
    case "state":
      cliLog.debug(`state: ${event.state}`);
      break;
    case "chunk":
      if (event.succeeded) {
        cliLog.info(`chunk ${event.chunkIndex + 1} done (${event.completed}/${event.total})`);
      } else {
        cliLog.warn(`chunk ${event.chunkIndex + 1} failed (${event.completed}/${event.total}): ${event.errorDetail ?? "unknown error"}`);
      }
      break;
    case "completed":
      cliLog.info("summary complete");
      break;
    case "failed":
      cliLog.error(`run failed (${event.reason.kind}): ${event.reason.message}`);
      break;
  }
}

async function main(): Promise<number> {
  const args = parseArgs();
  if (args.printConfig) printConfigSnapshot(cfg);

  const { contentId, source, text } = await loadTranscript(args);
  // A different --model brings its own context window, so the request budgets are re-derived.
  const runCfg = args.model === cfg.llm.model ? cfg : loadConfig({ model: args.model });
  const generator = await getTextGenerator(runCfg);
  cliLog.info(`text generator: ${getTextGeneratorInfo(runCfg).description}`);
  const pipeline = await createDigestPipeline(runCfg, generator, {
    style: args.style,
    maxWordsPerChunk: args.maxWords,
    concurrency: args.concurrency,
  });

  const controller = new AbortController();
  const onSigint = () => {
    cliLog.warn("cancelling…");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const summaryParts: string[] = [];
  try {
    const outcome = await pipeline.run(text, {
      signal: controller.signal,
      onProgress: renderProgress,
      onSummary: (event) => {
        summaryParts.push(event.delta);
        process.stdout.write(event.delta);
      },
    });
    if (summaryParts.length > 0) process.stdout.write("\n");

    const summaryMarkdown = summaryParts.join("");

    if (!args.noWrite) {
      const output = writeDigestOutputs({
        outputDir: args.outputDir,
        label: contentId,
        summaryMarkdown: summaryMarkdown || null,
        meta: buildDigestMeta({
          contentId,
          source,
          model: pipeline.settings.model,
          style: pipeline.settings.style,
          maxWordsPerChunk: pipeline.settings.maxWordsPerChunk,
          outcome,
          summaryChars: summaryMarkdown.length,
        }),
      });
      if (output.summaryPath) cliLog.info(`summary written: ${output.summaryPath}`);
      cliLog.info(`meta written: ${output.metaPath}`);
    }

    for (const failed of outcome.failedChunks) {
      cliLog.warn(`chunk ${failed.chunkIndex + 1} missing from summary: ${failed.errorDetail}`);
    }

    return outcome.state === "Completed" ? 0 : 1;
  } finally {
    process.off("SIGINT", onSigint);
    pipeline.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof TranscriptUnavailableError) {
      cliLog.error(`transcript unavailable (${err.reason}): ${err.message}`);
      if (err.availableLanguages?.length) {
        cliLog.error(`available caption languages: ${err.availableLanguages.join(", ")}`);
      }
    } else {
      cliLog.error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = 1;
  });
