export type LinkState = "disconnected" | "connected" | "ready";

export type LinkError =
  | "link_unavailable"
  | "not_connected"
  | "write_failed"
  | "ack_timeout"
  | "nack";

export type CommandError = LinkError | "unknown_actuator" | "out_of_range";

export type SendResult =
  | { ok: true; channel: number; angle: number }
  | { ok: false; error: CommandError; message?: string };

export type ConnectResult =
  | { ok: true; handshake: "ready" | "timeout" }
  | { ok: false; error: "link_unavailable"; message: string };

export type MoveResult =
  | { ok: true; sent: number; failed: number }
  | { ok: false; error: "unknown_actuator" | "out_of_range" };

export type PerformResult =
  | { ok: true; name: string; steps: number; failed: number }
  | { ok: false; error: "unknown_gesture" };

// Tag produced by the language model alongside its spoken reply.
export type ReplyGesture = "yes" | "no" | "neutral";

export type ChatReply = {
  speech: string;
  gesture: ReplyGesture;
};

export type AckMessage = {
  id: string;
  status: "ok" | "error";
  message?: string;
};

export type RobotState = {
  linkState: LinkState;
  busy: boolean;
  positions: Record<string, number>;
  lastGesture?: string;
  updatedAt: string;
};

export interface Responder {
  reply(message: string): Promise<ChatReply>;
  clearMemory(): void;
}

export interface SpeechOutput {
  speak(text: string): Promise<boolean>;
}

export interface SpeechInput {
  transcribe(filePath: string): Promise<string | null>;
}
