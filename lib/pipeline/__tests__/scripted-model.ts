import type {
  GenerateObjectOptions,
  GenerateObjectResult,
  LLMCallContext,
  LLMModel,
  Message,
} from "../core/types";

export interface RecordedCall {
  system?: string;
  messages: Message[];
  log?: LLMCallContext;
}

/** A reply is a raw object (parsed through the call's schema) or an Error to throw. */
export type ScriptedReply = unknown;

/**
 * In-process LLMModel. Replies come from a queue or a function of the call;
 * every reply goes through the caller's schema like a real response. A
 * reply the caller's validator rejects takes the next reply, up to
 * maxRetries more times.
 */
export class ScriptedModel implements LLMModel {
  readonly calls: RecordedCall[] = [];
  private readonly queue: ScriptedReply[];
  private readonly respond?: (call: RecordedCall, index: number) => ScriptedReply;

  constructor(
    replies: ScriptedReply[] | ((call: RecordedCall, index: number) => ScriptedReply)
  ) {
    if (typeof replies === "function") {
      this.queue = [];
      this.respond = replies;
    } else {
      this.queue = [...replies];
    }
  }

  async generateObject<T>(
    opts: GenerateObjectOptions<T>
  ): Promise<GenerateObjectResult<T>> {
    const maxRetries = opts.maxRetries ?? 0;
    const failures: string[] = [];

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const object = opts.schema.parse(this.next(opts));
      if (!opts.validate) return { object };

      const check = opts.validate(object);
      if (check.valid) return { object };
      failures.push(...check.errors);
    }

    throw new Error(
      `Validation failed after ${maxRetries + 1} attempts. Errors:\n${failures.join("\n")}`
    );
  }

  /** Record one model call and take its reply. Errors are thrown. */
  private next<T>(opts: GenerateObjectOptions<T>): ScriptedReply {
    const call: RecordedCall = {
      system: opts.system,
      messages: opts.messages,
      log: opts.log,
    };
    const index = this.calls.length;
    this.calls.push(call);

    let reply: ScriptedReply;
    if (this.respond) {
      reply = this.respond(call, index);
    } else {
      if (this.queue.length === 0) {
        throw new Error(`No scripted reply for call ${index + 1}`);
      }
      reply = this.queue.shift();
    }

    if (reply instanceof Error) throw reply;
    return reply;
  }
}

/** Text parts of the call's user messages, joined with newlines. */
export function userText(call: RecordedCall): string {
  return call.messages
    .filter((m) => m.role === "user")
    .flatMap((m) =>
      typeof m.content === "string"
        ? [m.content]
        : m.content.flatMap((p) => (p.type === "text" ? [p.text] : []))
    )
    .join("\n");
}

/** Image payloads of the call's user messages, in order. */
export function userImages(call: RecordedCall): string[] {
  return call.messages.flatMap((m) =>
    m.role === "user" && typeof m.content !== "string"
      ? m.content.flatMap((p) => (p.type === "image" ? [p.image] : []))
      : []
  );
}
