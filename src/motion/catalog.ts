import { ActuatorName } from "./actuators";

type Actuator = ActuatorName | "head";

export type DiscreteStep = readonly [Actuator, number];

export type RoutineStep =
  | { kind: "move"; actuator: Actuator; angle: number; steps?: number }
  | { kind: "pause"; ms: number }
  | { kind: "repeat"; times: number; body: readonly RoutineStep[] }
  | { kind: "rest" };

export const GESTURE_NAMES = [
  "wave",
  "nod",
  "shake",
  "rest",
  "happy",
  "sad",
  "excited",
  "curious",
] as const;

export type GestureName = (typeof GESTURE_NAMES)[number];

export const MOOD_NAMES = ["happy", "sad", "excited", "curious"] as const;

export type MoodName = (typeof MOOD_NAMES)[number];

// Smoothed routines share the gesture names.
export type RoutineName = GestureName;

const move = (actuator: Actuator, angle: number, steps?: number): RoutineStep => ({
  kind: "move",
  actuator,
  angle,
  steps,
});
const pause = (ms: number): RoutineStep => ({ kind: "pause", ms });
const repeat = (times: number, body: RoutineStep[]): RoutineStep => ({ kind: "repeat", times, body });
const REST: RoutineStep = { kind: "rest" };

/** Waypoints played one command at a time, without interpolation. */
export const GESTURES: Readonly<Record<GestureName, readonly DiscreteStep[]>> = {
  wave: [
    ["pan", 90], ["right_arm", 70], ["right_arm", 40],
    ["right_arm", 70], ["right_arm", 40], ["right_arm", 70],
    ["right_arm", 40], ["left_arm", 90], ["right_arm", 90],
  ],
  nod: [["pan", 105], ["pan", 75], ["pan", 105], ["pan", 75], ["pan", 90]],
  shake: [["pan", 65], ["pan", 115], ["pan", 65], ["pan", 115], ["pan", 90]],
  happy: [
    ["left_arm", 170], ["right_arm", 170], ["pan", 75],
    ["pan", 105], ["pan", 75], ["pan", 105],
    ["left_arm", 90], ["right_arm", 90], ["pan", 90],
  ],
  sad: [
    ["pan", 50], ["left_arm", 60], ["right_arm", 60],
    ["pan", 50], ["left_arm", 90], ["right_arm", 90], ["pan", 90],
  ],
  excited: [
    ["left_arm", 170], ["right_arm", 170], ["pan", 60],
    ["pan", 120], ["left_arm", 90], ["right_arm", 90], ["pan", 90],
  ],
  curious: [
    ["pan", 70], ["left_arm", 110], ["right_arm", 110],
    ["pan", 70], ["left_arm", 90], ["right_arm", 90], ["pan", 90],
  ],
  rest: [["pan", 90], ["left_arm", 90], ["right_arm", 90]],
};

/** Smoothed routines: interpolated moves with hand-tuned step counts and pauses. */
export const ROUTINES: Readonly<Record<RoutineName, readonly RoutineStep[]>> = {
  wave: [
    move("head", 90),
    pause(200),
    repeat(3, [move("right_arm", 70, 5), pause(150), move("right_arm", 40, 5), pause(150)]),
    REST,
  ],
  nod: [
    repeat(2, [move("head", 105, 5), pause(150), move("head", 75, 5), pause(150)]),
    move("head", 90),
  ],
  shake: [
    repeat(2, [move("head", 65, 5), pause(150), move("head", 115, 5), pause(150)]),
    move("head", 90),
  ],
  rest: [REST],
  happy: [
    move("left_arm", 170, 5),
    move("right_arm", 170, 5),
    pause(300),
    repeat(3, [move("head", 75, 3), pause(100), move("head", 105, 3), pause(100)]),
    REST,
  ],
  sad: [
    move("head", 50, 10),
    pause(300),
    move("left_arm", 60, 10),
    move("right_arm", 60, 10),
    pause(1500),
    REST,
  ],
  excited: [
    move("left_arm", 170, 3),
    move("right_arm", 170, 3),
    pause(200),
    repeat(2, [move("head", 60, 4), move("head", 120, 4)]),
    REST,
  ],
  curious: [
    move("head", 70, 10),
    pause(200),
    move("left_arm", 110, 10),
    move("right_arm", 110, 10),
    pause(1000),
    REST,
  ],
};

export function isGestureName(name: string): name is GestureName {
  return (GESTURE_NAMES as readonly string[]).includes(name);
}

export function isMoodName(name: string): name is MoodName {
  return (MOOD_NAMES as readonly string[]).includes(name);
}

export function lookupGesture(name: string): readonly DiscreteStep[] | undefined {
  return isGestureName(name) ? GESTURES[name] : undefined;
}

export function lookupRoutine(name: string): readonly RoutineStep[] | undefined {
  return isGestureName(name) ? ROUTINES[name] : undefined;
}
