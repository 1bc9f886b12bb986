import { Todo, TodoCreate, createTodo } from "../../core/entities/todo";
import { Option, none, some } from "../../core/entities/option";
import { TodoNotFoundError } from "../../core/errors";
import { TodoRepository } from "../../core/ports/TodoRepository";
import JsonRecordStore from "../persistence/jsonRecordStore";

// Method bodies never await, so each mutation and its flush finish in one tick.
export default class JsonFileTodoRepository implements TodoRepository {
  constructor(private readonly store: JsonRecordStore) {}

  async getAll(): Promise<Todo[]> {
    return this.store.values();
  }

  async get(id: number): Promise<Option<Todo>> {
    const t = this.store.get(id);
    return t ? some(t) : none;
  }

  async save(input: TodoCreate): Promise<Todo> {
    const todo = createTodo({ id: this.store.nextId(), text: input.text, done: input.done });
    this.store.set(todo);
    return { ...todo };
  }

  async update(todo: Todo): Promise<Todo> {
    if (!this.store.has(todo.id)) throw new TodoNotFoundError(todo.id);
    const updated: Todo = { id: todo.id, text: todo.text, done: todo.done };
    this.store.set(updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.store.remove(id);
  }

  async count(): Promise<number> {
    return this.store.size;
  }
}
