export type ActuatorSpec = {
  channel: number;
  rest: number;
};

export const DEFAULT_ACTUATORS = {
  pan: { channel: 2, rest: 90 },
  left_arm: { channel: 4, rest: 90 },
  right_arm: { channel: 5, rest: 90 },
} as const satisfies Record<string, ActuatorSpec>;

export type ActuatorName = keyof typeof DEFAULT_ACTUATORS;

export const ACTUATOR_NAMES: readonly ActuatorName[] = ["pan", "left_arm", "right_arm"];

const ALIASES: Readonly<Record<string, ActuatorName>> = {
  head: "pan",
};

export type ActuatorTable = Readonly<Record<ActuatorName, ActuatorSpec>>;

function isActuatorName(name: string): name is ActuatorName {
  return (ACTUATOR_NAMES as readonly string[]).includes(name);
}

/** Maps a name or alias to its canonical actuator; `null` when the name is not wired. */
export function resolveActuator(name: string): ActuatorName | null {
  if (isActuatorName(name)) return name;
  return ALIASES[name] ?? null;
}

/**
 * Builds the channel table, applying configured channel overrides.
 * Overrides keyed by unknown names are ignored.
 */
export function buildActuatorTable(overrides: Record<string, number> = {}): ActuatorTable {
  const table: Record<ActuatorName, ActuatorSpec> = {
    pan: { ...DEFAULT_ACTUATORS.pan },
    left_arm: { ...DEFAULT_ACTUATORS.left_arm },
    right_arm: { ...DEFAULT_ACTUATORS.right_arm },
  };
  for (const [name, channel] of Object.entries(overrides)) {
    const actuator = resolveActuator(name);
    if (actuator) table[actuator] = { ...table[actuator], channel };
  }
  return table;
}
