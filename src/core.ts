import { Env } from "./utils/env";
import { Logger } from "./utils/logger";
import { ActuatorLink } from "./serial/link";
import { TransportFactory, openSerialTransport } from "./serial/transport";
import { GestureExecutor } from "./motion/executor";
import { buildActuatorTable } from "./motion/actuators";
import { LlmClient } from "./llm/client";
import { SpeechClient } from "./speech/client";
import { AudioPlayer, AudioRecorder } from "./speech/player";

export type MotionCore = {
  link: ActuatorLink;
  executor: GestureExecutor;
};

export function createMotionCore(
  env: Env,
  logger: Logger,
  createTransport: TransportFactory = openSerialTransport
): MotionCore {
  const link = new ActuatorLink(
    {
      port: env.SERIAL_PORT,
      baudRate: env.SERIAL_BAUD,
      handshakeTimeoutMs: env.SERIAL_HANDSHAKE_TIMEOUT_MS,
      ackTimeoutMs: env.SERIAL_ACK_TIMEOUT_MS,
      commandDelayMs: env.SERIAL_COMMAND_DELAY_MS,
      angleMin: env.ANGLE_MIN,
      angleMax: env.ANGLE_MAX,
      actuators: buildActuatorTable(env.SERVO_CHANNELS),
    },
    logger.child("serial"),
    createTransport
  );
  const executor = new GestureExecutor(
    link,
    {
      gestureStepDelayMs: env.GESTURE_STEP_DELAY_MS,
      smoothSteps: env.SMOOTH_STEPS,
      smoothStepDelayMs: env.SMOOTH_STEP_DELAY_MS,
      pauseScale: env.ROUTINE_PAUSE_SCALE,
    },
    logger.child("motion")
  );
  return { link, executor };
}

export type VoiceServices = {
  responder: LlmClient;
  speech: SpeechClient;
  recorder: AudioRecorder;
};

/** Speech and chat need an API key; without one the caller runs in degraded mode. */
export function createVoiceServices(env: Env, logger: Logger): VoiceServices | null {
  if (!env.OPENAI_API_KEY) {
    logger.warn("OPENAI_API_KEY not set; speech and chat disabled");
    return null;
  }
  const player = new AudioPlayer(env.AUDIO_PLAYER_COMMAND, logger.child("audio"));
  return {
    responder: new LlmClient(env, logger.child("llm")),
    speech: new SpeechClient(env, logger.child("speech"), player),
    recorder: new AudioRecorder(env.AUDIO_RECORD_COMMAND, logger.child("audio")),
  };
}
