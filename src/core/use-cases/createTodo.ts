import { TodoRepository } from "../ports/TodoRepository";
import validateTodoInput from "./validateTodoInput";

export default (repo: TodoRepository) => async (input: unknown) => {
  return repo.save(validateTodoInput(input));
};
