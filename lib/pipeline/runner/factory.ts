/**
 * Runner Factory
 *
 * Creates a fully configured RunnerConfig from the loaded config.
 * This is the main entry point for setting up the pipeline.
 */

import path from "node:path";
import type { Progress, RunnerConfig } from "./types";
import { nullProgress } from "./types";
import { createFileStorage } from "./storage-adapter";
import { createLLMModel } from "../core/llm";
import { createLogWriter, LLM_LOG_FILE } from "../llm-log";
import { CACHE_DIR } from "../types";
import { renderPdfFile } from "../../pdf/render";
import {
  getLayoutDetectionSettings,
  getProvider,
  getRenderSettings,
  getTextExtractionSettings,
  type AppConfig,
} from "../../config";

export interface CreateRunnerOptions {
  config: AppConfig;
  outputRoot: string;
  progress?: Progress;
  skipCache?: boolean;
}

/**
 * Create a RunnerConfig: filesystem storage under outputRoot, one cached
 * LLM model per task, the mupdf renderer and resolved settings.
 */
export function createRunner(options: CreateRunnerOptions): RunnerConfig {
  const { config, outputRoot, progress = nullProgress, skipCache = false } =
    options;

  const storage = createFileStorage(outputRoot);
  const provider = getProvider(config);
  const render = getRenderSettings(config);
  const textExtraction = getTextExtractionSettings(config);
  const layoutDetection = getLayoutDetectionSettings(config);

  const cacheDir = path.join(storage.outputRoot, CACHE_DIR);
  const onLog = createLogWriter(path.join(storage.outputRoot, LLM_LOG_FILE));

  return {
    storage,
    progress,
    models: {
      text: createLLMModel({
        provider,
        modelId: textExtraction.model,
        cacheDir,
        skipCache,
        onLog,
      }),
      detection: createLLMModel({
        provider,
        modelId: layoutDetection.model,
        cacheDir,
        skipCache,
        onLog,
      }),
    },
    renderer: renderPdfFile,
    settings: { render, textExtraction, layoutDetection },
  };
}
