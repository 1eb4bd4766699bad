import { spawn } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { Logger } from "../utils/logger";

/** Runs `command` with the file path appended as its last argument. */
function runWithFile(command: string, file: string): Promise<void> {
  const [bin, ...args] = command.split(/\s+/).filter(Boolean);
  if (!bin) return Promise.reject(new Error("Audio command is empty"));
  return new Promise((resolve, reject) => {
    const child = spawn(bin, [...args, file], { stdio: "ignore" });
    child.on("error", reject);
    child.on("exit", (code) => {
      if (code === 0) resolve();
      else reject(new Error(`${bin} exited with code ${code}`));
    });
  });
}

async function removeQuietly(file: string, logger: Logger) {
  await fs.unlink(file).catch((err) => logger.debug("Temp audio cleanup failed", { file, message: String(err) }));
}

/** Plays wav audio by handing a temp file to an external player (aplay, afplay, ...). */
export class AudioPlayer {
  private command: string;
  private logger: Logger;
  private tmpDir: string;

  constructor(command: string, logger: Logger, tmpDir = os.tmpdir()) {
    this.command = command;
    this.logger = logger;
    this.tmpDir = tmpDir;
  }

  async play(wav: Buffer): Promise<void> {
    const file = path.join(this.tmpDir, `speech-${uuidv4()}.wav`);
    await fs.writeFile(file, wav);
    try {
      await runWithFile(this.command, file);
    } finally {
      await removeQuietly(file, this.logger);
    }
  }
}

/**
 * Captures a clip from the microphone with an external recorder (arecord, sox, ...)
 * that writes to the path it is given.
 */
export class AudioRecorder {
  private command: string;
  private logger: Logger;
  private tmpDir: string;

  constructor(command: string, logger: Logger, tmpDir = os.tmpdir()) {
    this.command = command;
    this.logger = logger;
    this.tmpDir = tmpDir;
  }

  /** Records into a temp file, hands it to `use`, then deletes it. */
  async record<T>(use: (file: string) => Promise<T>): Promise<T> {
    const file = path.join(this.tmpDir, `recording-${uuidv4()}.wav`);
    this.logger.info("Recording", { command: this.command });
    try {
      await runWithFile(this.command, file);
      return await use(file);
    } finally {
      await removeQuietly(file, this.logger);
    }
  }
}
