import { TodoCreate } from "../entities/todo";
import { ValidationError } from "../errors";

export default function validateTodoInput(input: unknown): Required<TodoCreate> {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new ValidationError("body must be a JSON object");
  }
  const text = "text" in input ? input.text : undefined;
  const done = "done" in input ? input.done : undefined;

  if (typeof text !== "string" || !text.trim()) {
    throw new ValidationError("text is required");
  }
  if (typeof done !== "undefined" && typeof done !== "boolean") {
    throw new ValidationError("done must be a boolean");
  }
  return { text, done: done ?? false };
}
