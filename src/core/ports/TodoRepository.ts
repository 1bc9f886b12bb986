import type { Todo, TodoCreate } from "../entities/todo";
import type { Option } from "../entities/option";

export interface TodoRepository {
  getAll(): Promise<Todo[]>;
  get(id: number): Promise<Option<Todo>>;
  save(input: TodoCreate): Promise<Todo>;
  /** Full replace. Rejects with TodoNotFoundError when `todo.id` is not stored. */
  update(todo: Todo): Promise<Todo>;
  /** Resolves false, without touching storage, when the id is absent. */
  delete(id: number): Promise<boolean>;
  count(): Promise<number>;
}
