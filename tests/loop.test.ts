import { describe, it, expect, vi } from "vitest";
import { ConversationLoop, HELP_TEXT } from "../src/console/loop";
import { silentLogger } from "../src/utils/logger";
import { ChatReply, ReplyGesture } from "../src/types";

function setup(reply: ChatReply, transcript: string | null = "what is your name") {
  const printed: string[] = [];
  const recorder = {
    record: <T>(use: (file: string) => Promise<T>): Promise<T> => use("/tmp/mic.wav"),
  };
  vi.spyOn(recorder, "record");
  const deps = {
    responder: { reply: vi.fn(async (_message: string) => reply), clearMemory: vi.fn() },
    speech: {
      speak: vi.fn(async (_text: string) => true),
      transcribe: vi.fn(async (_file: string) => transcript),
    },
    executor: { react: vi.fn(async (_gesture: ReplyGesture) => null) },
    recorder,
    logger: silentLogger,
    print: (text: string) => printed.push(text),
  };
  return { loop: new ConversationLoop(deps), deps, printed };
}

describe("ConversationLoop", () => {
  it("answers typed text with a gesture and speech", async () => {
    const { loop, deps, printed } = setup({ speech: "Hi! Great to meet you.", gesture: "yes" });

    expect(await loop.handleLine("  Hello there  ")).toBe("continue");

    expect(deps.responder.reply).toHaveBeenCalledWith("Hello there");
    expect(deps.executor.react).toHaveBeenCalledWith("yes");
    expect(deps.speech.speak).toHaveBeenCalledWith("Hi! Great to meet you.");
    expect(printed).toEqual(["Hi! Great to meet you."]);
  });

  it("transcribes a recording before answering it", async () => {
    const { loop, deps, printed } = setup({ speech: "I'm your companion.", gesture: "neutral" });

    await loop.handleLine("listen /tmp/input.wav");

    expect(deps.speech.transcribe).toHaveBeenCalledWith("/tmp/input.wav");
    expect(deps.responder.reply).toHaveBeenCalledWith("what is your name");
    expect(printed).toEqual(["You said: what is your name", "I'm your companion."]);
  });

  it("skips the turn when a recording cannot be transcribed", async () => {
    const { loop, deps, printed } = setup({ speech: "unused", gesture: "neutral" }, null);

    await loop.handleLine("listen /tmp/silence.wav");

    expect(deps.responder.reply).not.toHaveBeenCalled();
    expect(printed).toEqual(["Could not understand that recording."]);
  });

  it("records from the microphone on an empty line and answers it", async () => {
    const { loop, deps, printed } = setup({ speech: "Nice to hear you.", gesture: "yes" });

    expect(await loop.handleLine("   ")).toBe("continue");

    expect(deps.recorder.record).toHaveBeenCalledOnce();
    expect(deps.speech.transcribe).toHaveBeenCalledWith("/tmp/mic.wav");
    expect(deps.responder.reply).toHaveBeenCalledWith("what is your name");
    expect(deps.executor.react).toHaveBeenCalledWith("yes");
    expect(printed).toEqual(["Listening...", "You said: what is your name", "Nice to hear you."]);
  });

  it("reports a recorder failure and keeps going", async () => {
    const { loop, deps, printed } = setup({ speech: "unused", gesture: "neutral" });
    vi.mocked(deps.recorder.record).mockRejectedValueOnce(new Error("arecord exited with code 1"));

    expect(await loop.handleLine("")).toBe("continue");

    expect(deps.speech.transcribe).not.toHaveBeenCalled();
    expect(deps.responder.reply).not.toHaveBeenCalled();
    expect(printed).toEqual(["Listening...", "Recording failed."]);
  });

  it("clears memory, shows help and exits", async () => {
    const { loop, deps, printed } = setup({ speech: "unused", gesture: "neutral" });

    expect(await loop.handleLine("CLEAR")).toBe("continue");
    expect(deps.responder.clearMemory).toHaveBeenCalledOnce();
    expect(await loop.handleLine("help")).toBe("continue");
    expect(await loop.handleLine("exit")).toBe("exit");
    expect(printed).toEqual(["Memory cleared.", HELP_TEXT]);
  });
});
