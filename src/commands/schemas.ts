import { z } from "zod";

export const ServoBodySchema = z.object({
  servo: z.string().min(1),
  angle: z.number().int(),
});

export const GestureBodySchema = z.object({
  gesture: z.string().min(1),
});

export const MoodBodySchema = z.object({
  mood: z.string().min(1),
});

export const SpeakBodySchema = z.object({
  text: z.string().trim().min(1, "No text provided"),
});

export const ChatBodySchema = z.object({
  message: z.string().trim().min(1, "No message provided"),
  speak: z.boolean().optional(),
});

export const CommandMessageSchema = z.discriminatedUnion("type", [
  z.object({ id: z.string().min(1), type: z.literal("servo"), payload: ServoBodySchema }),
  z.object({ id: z.string().min(1), type: z.literal("gesture"), payload: GestureBodySchema }),
  z.object({ id: z.string().min(1), type: z.literal("mood"), payload: MoodBodySchema }),
  z.object({ id: z.string().min(1), type: z.literal("status"), payload: z.record(z.unknown()).optional() }),
]);

export type CommandMessage = z.infer<typeof CommandMessageSchema>;

/** First issue of a failed parse, formatted as `path: message`. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
