export interface ParsedFlags {
  positional: string[];
  input?: string;
  output?: string;
  config?: string;
  provider?: string;
  model?: string;
  textModel?: string;
  dpi?: number;
  minConf?: number;
  pagesPerCall?: number;
  maxPages?: number;
  maxPdfs?: number;
  noPageImages: boolean;
  skipCache: boolean;
  help: boolean;
}

type StringFlag = "input" | "output" | "config" | "provider" | "model" | "textModel";
type NumberFlag = "dpi" | "minConf" | "pagesPerCall" | "maxPages" | "maxPdfs";

const STRING_FLAGS: Record<string, StringFlag> = {
  "--input": "input",
  "--output": "output",
  "--config": "config",
  "--provider": "provider",
  "--model": "model",
  "--text-model": "textModel",
};

const NUMBER_FLAGS: Record<string, { key: NumberFlag; integer: boolean }> = {
  "--dpi": { key: "dpi", integer: true },
  "--min-conf": { key: "minConf", integer: false },
  "--pages-per-call": { key: "pagesPerCall", integer: true },
  "--max-pages": { key: "maxPages", integer: true },
  "--max-pdfs": { key: "maxPdfs", integer: true },
};

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    positional: [],
    noPageImages: false,
    skipCache: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--skip-cache") {
      flags.skipCache = true;
    } else if (arg === "--no-page-images") {
      flags.noPageImages = true;
    } else if (Object.hasOwn(STRING_FLAGS, arg)) {
      flags[STRING_FLAGS[arg]] = takeValue(args, ++i, arg);
    } else if (Object.hasOwn(NUMBER_FLAGS, arg)) {
      const { key, integer } = NUMBER_FLAGS[arg];
      flags[key] = parseNumber(takeValue(args, ++i, arg), arg, integer);
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      flags.positional.push(arg);
    }
  }

  return flags;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseNumber(value: string, flag: string, integer: boolean): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || (integer && !Number.isInteger(n))) {
    throw new Error(`Invalid value for ${flag}: "${value}"`);
  }
  return n;
}

/**
 * Translate CLI flags into a partial config to merge over config.yaml.
 * --model names the detection model and the default for text extraction.
 */
export function flagsToConfigOverrides(
  flags: ParsedFlags
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const render: Record<string, unknown> = {};
  const text: Record<string, unknown> = {};
  const layout: Record<string, unknown> = {};

  if (flags.provider !== undefined) overrides.provider = flags.provider;
  if (flags.model !== undefined) {
    overrides.model = flags.model;
    layout.model = flags.model;
  }
  if (flags.maxPdfs !== undefined) overrides.max_pdfs = flags.maxPdfs;

  if (flags.dpi !== undefined) render.dpi = flags.dpi;
  if (flags.noPageImages) render.keep_page_images = false;

  if (flags.textModel !== undefined) text.model = flags.textModel;
  if (flags.pagesPerCall !== undefined) text.pages_per_call = flags.pagesPerCall;
  if (flags.maxPages !== undefined) text.max_pages = flags.maxPages;

  if (flags.minConf !== undefined) layout.min_confidence = flags.minConf;

  if (Object.keys(render).length > 0) overrides.render = render;
  if (Object.keys(text).length > 0) overrides.text_extraction = text;
  if (Object.keys(layout).length > 0) overrides.layout_detection = layout;

  return overrides;
}
