export type Turn = {
  role: "user" | "assistant";
  content: string;
};

/** Rolling chat history: keeps the last `maxTurns` exchanges plus the pending user message. */
export class ConversationMemory {
  private turns: Turn[] = [];
  private limit: number;

  constructor(maxTurns: number) {
    this.limit = maxTurns * 2 + 1;
  }

  add(role: Turn["role"], content: string) {
    this.turns.push({ role, content });
    if (this.turns.length > this.limit) {
      this.turns = this.turns.slice(-this.limit);
    }
  }

  messages(): readonly Turn[] {
    return this.turns;
  }

  clear() {
    this.turns = [];
  }
}
