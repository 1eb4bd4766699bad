import { GestureExecutor } from "../motion/executor";
import { AudioRecorder } from "../speech/player";
import { Logger } from "../utils/logger";
import { Responder, SpeechInput, SpeechOutput } from "../types";

export type LoopDeps = {
  responder: Responder;
  speech: SpeechOutput & SpeechInput;
  executor: Pick<GestureExecutor, "react">;
  recorder: Pick<AudioRecorder, "record">;
  logger: Logger;
  print: (text: string) => void;
};

export type LoopOutcome = "continue" | "exit";

export const HELP_TEXT = [
  "Commands:",
  "  <enter>        record from the microphone and answer",
  "  <text>         talk to the companion",
  "  listen <file>  transcribe a recorded wav file and answer it",
  "  help           show this list",
  "  clear          reset conversation memory",
  "  exit           quit",
].join("\n");

/**
 * One turn of the console conversation: input, model reply, body language, spoken answer.
 * The gesture runs before the reply is spoken.
 */
export class ConversationLoop {
  private deps: LoopDeps;

  constructor(deps: LoopDeps) {
    this.deps = deps;
  }

  async handleLine(input: string): Promise<LoopOutcome> {
    const line = input.trim();
    const lower = line.toLowerCase();
    const { responder, speech, recorder, logger, print } = this.deps;

    if (lower === "exit") return "exit";
    if (lower === "clear") {
      responder.clearMemory();
      print("Memory cleared.");
      return "continue";
    }
    if (lower === "help") {
      print(HELP_TEXT);
      return "continue";
    }

    if (!line) {
      print("Listening...");
      let transcript: string | null;
      try {
        transcript = await recorder.record((file) => speech.transcribe(file));
      } catch (err) {
        logger.error("Recording failed", { message: String(err) });
        print("Recording failed.");
        return "continue";
      }
      return this.answerTranscript(transcript);
    }
    if (lower.startsWith("listen ")) {
      const file = line.slice("listen ".length).trim();
      return this.answerTranscript(await speech.transcribe(file));
    }
    await this.answer(line);
    return "continue";
  }

  private async answerTranscript(transcript: string | null): Promise<LoopOutcome> {
    if (!transcript) {
      this.deps.print("Could not understand that recording.");
      return "continue";
    }
    this.deps.print(`You said: ${transcript}`);
    await this.answer(transcript);
    return "continue";
  }

  private async answer(message: string) {
    const { responder, speech, executor, logger, print } = this.deps;
    const reply = await responder.reply(message);
    logger.debug("Console reply", { gesture: reply.gesture, length: reply.speech.length });
    await executor.react(reply.gesture);
    if (reply.speech) {
      print(reply.speech);
      await speech.speak(reply.speech);
    }
  }
}
