import { CommandChannel } from "../serial/link";
import { MoveResult } from "../types";
import { sleep } from "../utils/sleep";
import { resolveActuator } from "./actuators";

export type SmoothOptions = {
  steps: number;
  stepDelayMs: number;
};

/** Angle of interpolation step `i` (1-based); the last step always lands on `target`. */
export function interpolate(start: number, target: number, step: number, steps: number): number {
  if (step >= steps) return target;
  return Math.trunc(start + ((target - start) * step) / steps);
}

/**
 * Open-loop interpolated move from the actuator's last commanded angle.
 * Nothing is read back from the servo; a link that is not ready makes this a no-op.
 */
export async function smoothMove(
  channel: CommandChannel,
  actuatorName: string,
  target: number,
  options: SmoothOptions
): Promise<MoveResult> {
  const actuator = resolveActuator(actuatorName);
  if (!actuator) return { ok: false, error: "unknown_actuator" };
  if (!channel.inRange(target)) return { ok: false, error: "out_of_range" };
  if (!channel.isReady()) return { ok: true, sent: 0, failed: 0 };

  const steps = Math.max(1, Math.trunc(options.steps));
  const start = channel.positionOf(actuator);
  let failed = 0;
  for (let i = 1; i <= steps; i++) {
    const result = await channel.send(actuator, interpolate(start, target, i, steps));
    if (!result.ok) failed++;
    await sleep(options.stepDelayMs);
  }
  return { ok: true, sent: steps, failed };
}
