import { Todo } from "../entities/todo";
import { Option, none, some } from "../entities/option";
import { TodoRepository } from "../ports/TodoRepository";
import validateTodoInput from "./validateTodoInput";

/**
 * Full replace: fields missing from `input` fall back to their defaults rather
 * than to the stored values.
 */
export default (repo: TodoRepository) => async (
  id: number,
  input: unknown
): Promise<Option<Todo>> => {
  const data = validateTodoInput(input);

  const existing = await repo.get(id);
  if (existing.kind === "none") return none;

  return some(await repo.update({ id, ...data }));
};
