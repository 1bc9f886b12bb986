import { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number) => {
  return repo.get(id);
};
