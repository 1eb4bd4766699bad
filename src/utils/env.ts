import { Level, isLevel } from "./logger";

export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type TtsVoice = (typeof TTS_VOICES)[number];

function isVoice(value: string | undefined): value is TtsVoice {
  return (TTS_VOICES as readonly (string | undefined)[]).includes(value);
}

export type Env = {
  LOG_LEVEL: Level;
  SERIAL_PORT: string;
  SERIAL_BAUD: number;
  SERIAL_HANDSHAKE_TIMEOUT_MS: number;
  SERIAL_ACK_TIMEOUT_MS: number;
  SERIAL_COMMAND_DELAY_MS: number;
  SERVO_CHANNELS: Record<string, number>;
  ANGLE_MIN: number;
  ANGLE_MAX: number;
  GESTURE_STEP_DELAY_MS: number;
  SMOOTH_STEPS: number;
  SMOOTH_STEP_DELAY_MS: number;
  ROUTINE_PAUSE_SCALE: number;
  HTTP_HOST: string;
  HTTP_PORT: number;
  CORS_ORIGINS: string[];
  OPENAI_API_KEY?: string;
  OPENAI_CHAT_MODEL: string;
  OPENAI_TTS_MODEL: string;
  OPENAI_TTS_VOICE: TtsVoice;
  OPENAI_STT_MODEL: string;
  CHAT_MAX_TURNS: number;
  COMPANION_NAME: string;
  AUDIO_PLAYER_COMMAND: string;
  AUDIO_RECORD_COMMAND: string;
  MQTT_URL?: string;
  MQTT_USERNAME?: string;
  MQTT_PASSWORD?: string;
  ROBOT_CMD_TOPIC: string;
  ROBOT_ACK_TOPIC: string;
  ROBOT_STATE_TOPIC: string;
};

type Source = Record<string, string | undefined>;

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function list(value: string | undefined, fallback: string[]): string[] {
  const items = (value || "")
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

/** Parses `pan:2,left_arm:4` into `{ pan: 2, left_arm: 4 }`; malformed pairs are dropped. */
export function parseChannels(value: string | undefined): Record<string, number> {
  const channels: Record<string, number> = {};
  for (const pair of list(value, [])) {
    const [name, channel] = pair.split(":").map((p) => p.trim());
    const parsed = Number(channel);
    if (name && channel && Number.isInteger(parsed) && parsed >= 0) {
      channels[name] = parsed;
    }
  }
  return channels;
}

// Nothing is required: a missing key or port leaves the process in degraded mode.
export function loadEnv(source: Source = process.env): Env {
  const level = source.LOG_LEVEL;
  const voice = source.OPENAI_TTS_VOICE;
  return {
    LOG_LEVEL: isLevel(level) ? level : "info",
    SERIAL_PORT: source.SERIAL_PORT || "/dev/ttyACM0",
    SERIAL_BAUD: num(source.SERIAL_BAUD, 9600),
    SERIAL_HANDSHAKE_TIMEOUT_MS: num(source.SERIAL_HANDSHAKE_TIMEOUT_MS, 3000),
    SERIAL_ACK_TIMEOUT_MS: num(source.SERIAL_ACK_TIMEOUT_MS, 200),
    SERIAL_COMMAND_DELAY_MS: num(source.SERIAL_COMMAND_DELAY_MS, 50),
    SERVO_CHANNELS: parseChannels(source.SERVO_CHANNELS),
    ANGLE_MIN: num(source.ANGLE_MIN, 0),
    ANGLE_MAX: num(source.ANGLE_MAX, 180),
    GESTURE_STEP_DELAY_MS: num(source.GESTURE_STEP_DELAY_MS, 150),
    SMOOTH_STEPS: Math.max(1, Math.trunc(num(source.SMOOTH_STEPS, 10))),
    SMOOTH_STEP_DELAY_MS: num(source.SMOOTH_STEP_DELAY_MS, 20),
    ROUTINE_PAUSE_SCALE: Math.max(0, num(source.ROUTINE_PAUSE_SCALE, 1)),
    HTTP_HOST: source.HTTP_HOST || "0.0.0.0",
    HTTP_PORT: num(source.HTTP_PORT, 5001),
    CORS_ORIGINS: list(source.CORS_ORIGINS, ["*"]),
    OPENAI_API_KEY: source.OPENAI_API_KEY || undefined,
    OPENAI_CHAT_MODEL: source.OPENAI_CHAT_MODEL || "gpt-4o-mini",
    OPENAI_TTS_MODEL: source.OPENAI_TTS_MODEL || "tts-1",
    OPENAI_TTS_VOICE: isVoice(voice) ? voice : "onyx",
    OPENAI_STT_MODEL: source.OPENAI_STT_MODEL || "whisper-1",
    CHAT_MAX_TURNS: Math.max(1, num(source.CHAT_MAX_TURNS, 10)),
    COMPANION_NAME: source.COMPANION_NAME || "Buddy",
    AUDIO_PLAYER_COMMAND: source.AUDIO_PLAYER_COMMAND || "aplay",
    AUDIO_RECORD_COMMAND: source.AUDIO_RECORD_COMMAND || "arecord -q -d 5 -f S16_LE -r 16000 -c 1 -t wav",
    MQTT_URL: source.MQTT_URL || undefined,
    MQTT_USERNAME: source.MQTT_USERNAME,
    MQTT_PASSWORD: source.MQTT_PASSWORD,
    ROBOT_CMD_TOPIC: source.ROBOT_CMD_TOPIC || "companion/cmd",
    ROBOT_ACK_TOPIC: source.ROBOT_ACK_TOPIC || "companion/ack",
    ROBOT_STATE_TOPIC: source.ROBOT_STATE_TOPIC || "companion/state",
  };
}
