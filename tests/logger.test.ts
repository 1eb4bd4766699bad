import { describe, it, expect } from "vitest";
import { createLogger } from "../src/utils/logger";
import { Mutex } from "../src/serial/mutex";

describe("createLogger", () => {
  it("drops messages below the threshold and scopes children", () => {
    const lines: string[] = [];
    const logger = createLogger("warn", (line) => lines.push(line));

    logger.info("ignored");
    logger.child("serial").warn("Serial handshake timed out", { port: "/dev/ttyACM0" });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe("warn");
    expect(entry.msg).toBe("Serial handshake timed out");
    expect(entry.component).toBe("serial");
    expect(entry.port).toBe("/dev/ttyACM0");
  });

  it("joins nested component names", () => {
    const lines: string[] = [];
    createLogger("debug", (line) => lines.push(line)).child("http").child("routes").debug("hit");

    expect(JSON.parse(lines[0]).component).toBe("http.routes");
  });
});

describe("Mutex", () => {
  it("runs tasks one at a time in submission order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const task = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`${name}:start`);
        setTimeout(() => {
          events.push(`${name}:end`);
          resolve(name);
        }, ms);
      });

    const results = await Promise.all([mutex.runExclusive(task("a", 10)), mutex.runExclusive(task("b", 1))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.isLocked()).toBe(false);
  });

  it("keeps going after a task rejects", async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(() => Promise.reject(new Error("boom")));
    const next = mutex.runExclusive(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
