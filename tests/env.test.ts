import { describe, it, expect } from "vitest";
import { loadEnv, parseChannels } from "../src/utils/env";
import { buildActuatorTable, resolveActuator } from "../src/motion/actuators";

describe("loadEnv", () => {
  it("starts with defaults and no required keys", () => {
    const env = loadEnv({});

    expect(env.SERIAL_PORT).toBe("/dev/ttyACM0");
    expect(env.SERIAL_BAUD).toBe(9600);
    expect(env.SERIAL_COMMAND_DELAY_MS).toBe(50);
    expect(env.GESTURE_STEP_DELAY_MS).toBe(150);
    expect(env.SMOOTH_STEPS).toBe(10);
    expect(env.SMOOTH_STEP_DELAY_MS).toBe(20);
    expect(env.HTTP_PORT).toBe(5001);
    expect(env.OPENAI_API_KEY).toBeUndefined();
    expect(env.MQTT_URL).toBeUndefined();
    expect(env.CORS_ORIGINS).toEqual(["*"]);
    expect(env.AUDIO_RECORD_COMMAND).toBe("arecord -q -d 5 -f S16_LE -r 16000 -c 1 -t wav");
    expect(env.LOG_LEVEL).toBe("info");
  });

  it("falls back on unparsable or unknown values", () => {
    const env = loadEnv({
      SERIAL_BAUD: "fast",
      LOG_LEVEL: "verbose",
      OPENAI_TTS_VOICE: "robot",
      SMOOTH_STEPS: "0",
    });

    expect(env.SERIAL_BAUD).toBe(9600);
    expect(env.LOG_LEVEL).toBe("info");
    expect(env.OPENAI_TTS_VOICE).toBe("onyx");
    expect(env.SMOOTH_STEPS).toBe(1);
  });

  it("reads overrides", () => {
    const env = loadEnv({
      SERIAL_PORT: "/dev/ttyUSB1",
      ANGLE_MAX: "170",
      CORS_ORIGINS: "http://a.test, http://b.test",
      LOG_LEVEL: "debug",
      OPENAI_TTS_VOICE: "nova",
    });

    expect(env.SERIAL_PORT).toBe("/dev/ttyUSB1");
    expect(env.ANGLE_MAX).toBe(170);
    expect(env.CORS_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
    expect(env.LOG_LEVEL).toBe("debug");
    expect(env.OPENAI_TTS_VOICE).toBe("nova");
  });
});

describe("servo channels", () => {
  it("parses name:channel pairs and drops malformed ones", () => {
    expect(parseChannels("pan:3, left_arm:6,broken,right_arm:x")).toEqual({ pan: 3, left_arm: 6 });
    expect(parseChannels(undefined)).toEqual({});
  });

  it("resolves aliases and ignores unknown names", () => {
    expect(resolveActuator("head")).toBe("pan");
    expect(resolveActuator("left_arm")).toBe("left_arm");
    expect(resolveActuator("tail")).toBeNull();

    expect(buildActuatorTable({ head: 7, tail: 1 })).toEqual({
      pan: { channel: 7, rest: 90 },
      left_arm: { channel: 4, rest: 90 },
      right_arm: { channel: 5, rest: 90 },
    });
  });
});
