import { GestureExecutor } from "../motion/executor";
import { AckMessage, PerformResult, SendResult } from "../types";
import { CommandMessage, CommandMessageSchema, describeIssue } from "./schemas";

const UNKNOWN_ID = "unknown";

export function describeSendFailure(result: SendResult): string | undefined {
  if (result.ok) return undefined;
  return result.error === "unknown_actuator" ? "Unknown servo" : result.message ?? result.error;
}

function performAck(id: string, result: PerformResult, label: string): AckMessage {
  if (result.ok) {
    return result.failed > 0
      ? { id, status: "ok", message: `${result.failed} of ${result.steps} steps failed` }
      : { id, status: "ok" };
  }
  return { id, status: "error", message: `Unknown ${label}` };
}

export async function executeCommand(executor: GestureExecutor, command: CommandMessage): Promise<AckMessage> {
  switch (command.type) {
    case "servo": {
      const result = await executor.setServo(command.payload.servo, command.payload.angle);
      return result.ok
        ? { id: command.id, status: "ok" }
        : { id: command.id, status: "error", message: describeSendFailure(result) };
    }
    case "gesture":
      return performAck(command.id, await executor.perform(command.payload.gesture), "gesture");
    case "mood":
      return performAck(command.id, await executor.performMood(command.payload.mood), "mood");
    case "status":
      return { id: command.id, status: "ok", message: executor.snapshot().linkState };
  }
}

/** Parses a raw command message and executes it; malformed input yields an error ack, never a throw. */
export async function handleCommandPayload(executor: GestureExecutor, raw: string): Promise<AckMessage> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { id: UNKNOWN_ID, status: "error", message: "Malformed JSON" };
  }
  const parsed = CommandMessageSchema.safeParse(json);
  if (!parsed.success) {
    const id =
      typeof json === "object" && json !== null && "id" in json && typeof json.id === "string"
        ? json.id
        : UNKNOWN_ID;
    return { id, status: "error", message: describeIssue(parsed.error) };
  }
  return executeCommand(executor, parsed.data);
}
