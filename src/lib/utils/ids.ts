import { nanoid } from "nanoid";

/**
 * Generate a task id. Also used as the prefix of every temp file a job
 * creates, so it must stay filename-safe (nanoid's alphabet is).
 */
export function generateTaskId(): string {
  return nanoid(12);
}
