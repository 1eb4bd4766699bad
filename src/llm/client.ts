import OpenAI from "openai";
import { z } from "zod";
import { Env } from "../utils/env";
import { Logger } from "../utils/logger";
import { ChatReply, Responder } from "../types";
import { ConversationMemory } from "./memory";

const PARSE_FALLBACK = "I'm having trouble processing that right now.";
const API_FALLBACK = "Something went wrong. Can you try again?";

export function buildSystemPrompt(name: string): string {
  return `You are ${name}, a friendly, playful robot companion with a cardboard body, a turning head and two arms.

Always answer with a JSON object of this exact shape:
{"speech": "what you say aloud, 2-4 warm sentences", "gesture": "yes|no|neutral"}

Pick the gesture from the user's message:
- "yes": the user is positive, agreeing, greeting, or asking something you answer with yes
- "no": the user is negative, disagreeing, or asking something you answer with no
- "neutral": anything else

You cannot browse the internet or check live data; say so kindly when asked.`;
}

const ReplySchema = z.object({
  speech: z.string().catch(""),
  gesture: z.enum(["yes", "no", "neutral"]).catch("neutral"),
});

/** Reads the model's JSON reply; anything unusable becomes the parse fallback. */
export function parseReply(raw: string): ChatReply {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { speech: PARSE_FALLBACK, gesture: "neutral" };
  }
  const parsed = ReplySchema.safeParse(json);
  if (!parsed.success) return { speech: PARSE_FALLBACK, gesture: "neutral" };
  return { speech: parsed.data.speech.trim(), gesture: parsed.data.gesture };
}

export class LlmClient implements Responder {
  private openai: OpenAI;
  private env: Env;
  private logger: Logger;
  private memory: ConversationMemory;
  private systemPrompt: string;

  constructor(env: Env, logger: Logger, openai?: OpenAI) {
    this.env = env;
    this.logger = logger;
    this.openai = openai ?? new OpenAI({ apiKey: env.OPENAI_API_KEY });
    this.memory = new ConversationMemory(env.CHAT_MAX_TURNS);
    this.systemPrompt = buildSystemPrompt(env.COMPANION_NAME);
  }

  async reply(userMessage: string): Promise<ChatReply> {
    const model = this.env.OPENAI_CHAT_MODEL;
    this.memory.add("user", userMessage);

    let raw: string;
    try {
      const response = await this.openai.chat.completions.create({
        model,
        messages: this.buildMessages(),
        max_tokens: 500,
        temperature: 0.8,
        response_format: { type: "json_object" },
      });
      raw = (response.choices[0]?.message.content ?? "").trim();
    } catch (err) {
      this.logger.error("Chat completion failed", { model, message: String(err) });
      return { speech: API_FALLBACK, gesture: "neutral" };
    }

    this.logger.debug("LLM raw response", { model, raw });
    const reply = parseReply(raw);
    if (reply.speech === PARSE_FALLBACK) {
      this.logger.warn("LLM reply was not valid JSON", { model, length: raw.length });
      return reply;
    }
    // Only the spoken part goes back into the history.
    this.memory.add("assistant", reply.speech);
    return reply;
  }

  private buildMessages(): OpenAI.Chat.ChatCompletionMessageParam[] {
    const history = this.memory.messages().map((turn): OpenAI.Chat.ChatCompletionMessageParam =>
      turn.role === "user"
        ? { role: "user", content: turn.content }
        : { role: "assistant", content: turn.content }
    );
    return [{ role: "system", content: this.systemPrompt }, ...history];
  }

  clearMemory() {
    this.memory.clear();
    this.logger.info("Conversation memory cleared");
  }
}
