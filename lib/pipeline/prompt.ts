import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  Liquid,
  Tag,
  type Context,
  type Emitter,
  type TagToken,
  type Template,
  type TopLevelToken,
} from "liquidjs";
import type { ContentPart } from "./core/types";

const IMAGE_MARKER_START = "\x00IMG:";
const IMAGE_MARKER_END = "\x00";

export type PromptRole = "system" | "user" | "assistant";

export interface PromptMessage {
  role: PromptRole;
  content: string | ContentPart[];
}

function isPromptRole(value: string): value is PromptRole {
  return value === "system" || value === "user" || value === "assistant";
}

/**
 * Custom {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} tag.
 * Emits delimiters that renderPrompt splits on to produce PromptMessage[].
 */
class ChatTag extends Tag {
  private role: PromptRole;
  private templates: Template[] = [];

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/role:\s*"(\w+)"/);
    if (!match || !isPromptRole(match[1])) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = match[1];
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`\x01CHAT:${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(`\x01ENDCHAT\x01`);
  }
}

/**
 * Custom {% image expr %} tag.
 * Evaluates the expression (a base64 PNG) and emits a marker that
 * renderPrompt converts into an image content part.
 */
class ImageTag extends Tag {
  private value: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    this.value = token.args.trim();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    const val = yield this.liquid.evalValue(this.value, ctx);
    emitter.write(`${IMAGE_MARKER_START}${String(val)}${IMAGE_MARKER_END}`);
  }
}

const PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts"
);

const engine = new Liquid({
  root: [PROMPTS_DIR],
  extname: ".liquid",
  strictVariables: false,
});

engine.registerTag("chat", ChatTag);
engine.registerTag("image", ImageTag);

/**
 * Render a .liquid prompt template and return structured PromptMessage[].
 * The template must use {% chat role: "..." %} blocks.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<PromptMessage[]> {
  const raw: string = await engine.renderFile(templateName, context);
  return parseMessages(raw);
}

function parseMessages(raw: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;
  let match;

  while ((match = chatRegex.exec(raw)) !== null) {
    const role = match[1];
    const body = match[2];
    if (!isPromptRole(role)) continue;

    if (role === "system") {
      messages.push({ role, content: body.trim() });
    } else {
      messages.push({ role, content: parseContentParts(body) });
    }
  }

  return messages;
}

function parseContentParts(body: string): ContentPart[] {
  const parts: ContentPart[] = [];
  const imageRegex = new RegExp(
    `${escapeRegex(IMAGE_MARKER_START)}(.*?)${escapeRegex(IMAGE_MARKER_END)}`,
    "g"
  );

  let lastIndex = 0;
  let match;

  while ((match = imageRegex.exec(body)) !== null) {
    const textBefore = collapseBlankLines(body.slice(lastIndex, match.index));
    if (textBefore) {
      parts.push({ type: "text", text: textBefore });
    }
    parts.push({ type: "image", image: match[1] });
    lastIndex = match.index + match[0].length;
  }

  const remaining = collapseBlankLines(body.slice(lastIndex));
  if (remaining) {
    parts.push({ type: "text", text: remaining });
  }

  return parts;
}

// Liquid control tags leave runs of empty lines behind
function collapseBlankLines(text: string): string {
  return text.replace(/\n\s*\n+/g, "\n").trim();
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
