import { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number) => {
  const existing = await repo.get(id);
  if (existing.kind === "none") return false;
  return repo.delete(id);
};
