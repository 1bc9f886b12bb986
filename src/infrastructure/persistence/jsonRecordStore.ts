import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { Todo, isValidTodoId } from "../../core/entities/todo";
import { CorruptStoreError, IdSpaceExhaustedError, PersistenceError } from "../../core/errors";

/**
 * Id -> Todo mapping kept in memory and mirrored to a single JSON array on disk.
 *
 * Every mutation is flushed synchronously before it returns. When the flush
 * fails the mutation is undone in memory and a PersistenceError is thrown, so
 * the mapping never drifts from what is on disk.
 */
export default class JsonRecordStore {
  private items = new Map<number, Todo>();
  private lastId = 0;

  constructor(readonly path: string) {
    for (const todo of this.load()) {
      this.items.set(todo.id, todo);
      this.lastId = Math.max(this.lastId, todo.id);
    }
  }

  get size(): number {
    return this.items.size;
  }

  values(): Todo[] {
    return Array.from(this.items.values()).map(t => ({ ...t }));
  }

  get(id: number): Todo | undefined {
    const t = this.items.get(id);
    return t ? { ...t } : undefined;
  }

  has(id: number): boolean {
    return this.items.has(id);
  }

  /** Ids are handed out once; a failed save or a delete does not give one back. */
  nextId(): number {
    if (this.lastId >= Number.MAX_SAFE_INTEGER) throw new IdSpaceExhaustedError(this.lastId);
    this.lastId += 1;
    return this.lastId;
  }

  set(todo: Todo): void {
    const previous = this.items.get(todo.id);
    this.items.set(todo.id, { ...todo });
    // Keeps nextId() from handing out an id that was stored directly.
    this.lastId = Math.max(this.lastId, todo.id);
    this.flushOrRollback(() => {
      if (previous) this.items.set(todo.id, previous);
      else this.items.delete(todo.id);
    });
  }

  remove(id: number): boolean {
    const previous = this.items.get(id);
    if (!previous) return false;

    // Map keeps insertion order, so a rollback has to rebuild it to put the entry back in place.
    const snapshot = new Map(this.items);
    this.items.delete(id);
    this.flushOrRollback(() => {
      this.items = snapshot;
    });
    return true;
  }

  private flushOrRollback(rollback: () => void): void {
    try {
      this.flush();
    } catch (err) {
      rollback();
      throw new PersistenceError(this.path, err);
    }
  }

  private flush(): void {
    const data = JSON.stringify(Array.from(this.items.values()), null, 2) + "\n";
    const tmpFile = this.path + ".tmp";
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(tmpFile, data, "utf-8");
    renameSync(tmpFile, this.path);
  }

  private load(): Todo[] {
    if (!existsSync(this.path)) return [];

    const raw = readFileSync(this.path, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CorruptStoreError(this.path, "invalid JSON", err);
    }

    if (!Array.isArray(parsed)) {
      throw new CorruptStoreError(this.path, "expected an array of todos");
    }

    const seen = new Set<number>();
    return parsed.map((entry: unknown, index) => {
      const todo = toTodo(entry);
      if (!todo) {
        throw new CorruptStoreError(this.path, `entry ${index} is not a valid todo`);
      }
      if (seen.has(todo.id)) {
        throw new CorruptStoreError(this.path, `duplicate id ${todo.id}`);
      }
      seen.add(todo.id);
      return todo;
    });
  }
}

function toTodo(entry: unknown): Todo | null {
  if (typeof entry !== "object" || entry === null) return null;
  if (!("id" in entry) || !("text" in entry) || !("done" in entry)) return null;
  const { id, text, done } = entry;
  if (!isValidTodoId(id) || typeof text !== "string" || typeof done !== "boolean") {
    return null;
  }
  return { id, text, done };
}
