import fs from "fs";
import OpenAI from "openai";
import { Env } from "../utils/env";
import { Logger } from "../utils/logger";
import { SpeechInput, SpeechOutput } from "../types";
import { AudioPlayer } from "./player";

type WavPlayer = Pick<AudioPlayer, "play">;

export class SpeechClient implements SpeechOutput, SpeechInput {
  private openai: OpenAI;
  private env: Env;
  private logger: Logger;
  private player: WavPlayer;

  constructor(env: Env, logger: Logger, player: WavPlayer, openai?: OpenAI) {
    this.env = env;
    this.logger = logger;
    this.player = player;
    this.openai = openai ?? new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }

  async synthesize(text: string): Promise<Buffer> {
    const response = await this.openai.audio.speech.create({
      model: this.env.OPENAI_TTS_MODEL,
      voice: this.env.OPENAI_TTS_VOICE,
      input: text,
      response_format: "wav",
    });
    return Buffer.from(await response.arrayBuffer());
  }

  async speak(text: string): Promise<boolean> {
    try {
      const wav = await this.synthesize(text);
      this.logger.info("Speaking", { length: text.length, bytes: wav.length });
      await this.player.play(wav);
      return true;
    } catch (err) {
      this.logger.error("TTS failed", { message: String(err) });
      return false;
    }
  }

  async transcribe(filePath: string): Promise<string | null> {
    try {
      const transcript = await this.openai.audio.transcriptions.create({
        model: this.env.OPENAI_STT_MODEL,
        file: fs.createReadStream(filePath),
      });
      const text = transcript.text.trim();
      this.logger.info("Transcribed audio", { file: filePath, length: text.length });
      return text || null;
    } catch (err) {
      this.logger.error("Transcription failed", { file: filePath, message: String(err) });
      return null;
    }
  }
}
