import { ActuatorLink, CommandChannel } from "../serial/link";
import { Logger } from "../utils/logger";
import { sleep } from "../utils/sleep";
import { MoveResult, PerformResult, ReplyGesture, RobotState, SendResult } from "../types";
import { ACTUATOR_NAMES } from "./actuators";
import { RoutineStep, isMoodName, lookupGesture, lookupRoutine } from "./catalog";
import { smoothMove } from "./smooth";

export type MotionTiming = {
  gestureStepDelayMs: number;
  smoothSteps: number;
  smoothStepDelayMs: number;
  /** Multiplier applied to routine pauses; 0 collapses them. */
  pauseScale: number;
};

type Tally = { steps: number; failed: number };

/**
 * Plays catalog entries on the actuator link. Every playback holds the link
 * lock for its whole duration, so concurrent callers queue rather than interleave.
 */
export class GestureExecutor {
  private link: ActuatorLink;
  private timing: MotionTiming;
  private logger: Logger;
  private lastGesture: string | undefined;

  constructor(link: ActuatorLink, timing: MotionTiming, logger: Logger) {
    this.link = link;
    this.timing = timing;
    this.logger = logger;
  }

  async perform(name: string): Promise<PerformResult> {
    const sequence = lookupGesture(name);
    if (!sequence) {
      this.logger.warn("Unknown gesture", { gesture: name });
      return { ok: false, error: "unknown_gesture" };
    }

    this.logger.info("Gesture start", { gesture: name, steps: sequence.length });
    const tally = await this.link.withLock(async (channel) => {
      let failed = 0;
      for (const [actuator, angle] of sequence) {
        const result = await channel.send(actuator, angle);
        if (!result.ok) failed++;
        await sleep(this.timing.gestureStepDelayMs);
      }
      return { steps: sequence.length, failed };
    });
    return this.finish(name, tally);
  }

  async performRoutine(name: string): Promise<PerformResult> {
    const routine = lookupRoutine(name);
    if (!routine) {
      this.logger.warn("Unknown routine", { routine: name });
      return { ok: false, error: "unknown_gesture" };
    }

    this.logger.info("Routine start", { routine: name });
    const tally = await this.link.withLock(async (channel) => {
      const acc: Tally = { steps: 0, failed: 0 };
      await this.play(channel, routine, acc);
      return acc;
    });
    return this.finish(name, tally);
  }

  performMood(mood: string): Promise<PerformResult> {
    if (!isMoodName(mood)) {
      this.logger.warn("Unknown mood", { mood });
      return Promise.resolve({ ok: false, error: "unknown_gesture" });
    }
    return this.performRoutine(mood);
  }

  /** Body language for a chat reply: nod for yes, shake for no, stillness otherwise. */
  async react(gesture: ReplyGesture): Promise<PerformResult | null> {
    switch (gesture) {
      case "yes":
        return this.performRoutine("nod");
      case "no":
        return this.performRoutine("shake");
      case "neutral":
        return null;
    }
  }

  setServo(actuator: string, angle: number): Promise<SendResult> {
    return this.link.send(actuator, angle);
  }

  smoothMove(actuator: string, angle: number, steps?: number): Promise<MoveResult> {
    return this.link.withLock((channel) =>
      smoothMove(channel, actuator, angle, {
        steps: steps ?? this.timing.smoothSteps,
        stepDelayMs: this.timing.smoothStepDelayMs,
      })
    );
  }

  snapshot(): RobotState {
    return {
      linkState: this.link.getState(),
      busy: this.link.isBusy(),
      positions: this.link.positions(),
      lastGesture: this.lastGesture,
      updatedAt: new Date().toISOString(),
    };
  }

  private async play(channel: CommandChannel, steps: readonly RoutineStep[], acc: Tally): Promise<void> {
    for (const step of steps) {
      switch (step.kind) {
        case "move":
          this.count(acc, await this.move(channel, step.actuator, step.angle, step.steps));
          break;
        case "pause":
          await sleep(step.ms * this.timing.pauseScale);
          break;
        case "repeat":
          for (let i = 0; i < step.times; i++) {
            await this.play(channel, step.body, acc);
          }
          break;
        case "rest":
          for (const actuator of ACTUATOR_NAMES) {
            this.count(acc, await this.move(channel, actuator, channel.restOf(actuator)));
          }
          break;
      }
    }
  }

  private move(channel: CommandChannel, actuator: string, angle: number, steps?: number): Promise<MoveResult> {
    return smoothMove(channel, actuator, angle, {
      steps: steps ?? this.timing.smoothSteps,
      stepDelayMs: this.timing.smoothStepDelayMs,
    });
  }

  private count(acc: Tally, result: MoveResult) {
    if (result.ok) {
      acc.steps += result.sent;
      acc.failed += result.failed;
    } else {
      this.logger.warn("Routine move rejected", { error: result.error });
    }
  }

  private finish(name: string, tally: Tally): PerformResult {
    this.lastGesture = name;
    if (tally.failed > 0) {
      this.logger.warn("Gesture finished with failed steps", { gesture: name, ...tally });
    } else {
      this.logger.info("Gesture complete", { gesture: name, steps: tally.steps });
    }
    return { ok: true, name, ...tally };
  }
}
