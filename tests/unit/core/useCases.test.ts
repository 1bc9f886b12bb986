/**
 * Tests for the todo use cases against a mocked repository.
 * @module tests/unit/core/useCases
 */

import { describe, it, expect, vi } from "vitest";

import makeCreateTodo from "../../../src/core/use-cases/createTodo";
import makeReplaceTodo from "../../../src/core/use-cases/replaceTodo";
import makeDeleteTodo from "../../../src/core/use-cases/deleteTodo";
import makeListTodos from "../../../src/core/use-cases/listTodos";
import makeGetTodo from "../../../src/core/use-cases/getTodo";
import validateTodoInput from "../../../src/core/use-cases/validateTodoInput";
import { TodoRepository } from "../../../src/core/ports/TodoRepository";
import { Todo } from "../../../src/core/entities/todo";
import { none, some } from "../../../src/core/entities/option";
import { ValidationError } from "../../../src/core/errors";

function mockRepo(stored: Todo[] = []) {
  return {
    getAll: vi.fn().mockResolvedValue(stored),
    get: vi.fn(async (id: number) => {
      const t = stored.find(s => s.id === id);
      return t ? some(t) : none;
    }),
    save: vi.fn(async (input: { text: string; done?: boolean }) => ({ id: 1, text: input.text, done: input.done ?? false })),
    update: vi.fn(async (todo: Todo) => todo),
    delete: vi.fn().mockResolvedValue(true),
    count: vi.fn().mockResolvedValue(stored.length),
  } satisfies TodoRepository;
}

describe("validateTodoInput", () => {
  it("should default done to false and keep text as given", () => {
    expect(validateTodoInput({ text: "  spaced  " })).toEqual({ text: "  spaced  ", done: false });
  });

  it.each([
    [null, "body must be a JSON object"],
    [[], "body must be a JSON object"],
    ["text", "body must be a JSON object"],
    [{}, "text is required"],
    [{ text: "   " }, "text is required"],
    [{ text: 5 }, "text is required"],
    [{ text: "ok", done: "true" }, "done must be a boolean"],
  ])("should reject %j", (input, message) => {
    expect(() => validateTodoInput(input)).toThrow(new ValidationError(message));
  });
});

describe("createTodo", () => {
  it("should save validated input", async () => {
    const repo = mockRepo();
    const created = await makeCreateTodo(repo)({ text: "write tests", done: true });
    expect(repo.save).toHaveBeenCalledWith({ text: "write tests", done: true });
    expect(created).toEqual({ id: 1, text: "write tests", done: true });
  });

  it("should not reach the repository on invalid input", async () => {
    const repo = mockRepo();
    await expect(makeCreateTodo(repo)({ done: true })).rejects.toBeInstanceOf(ValidationError);
    expect(repo.save).not.toHaveBeenCalled();
  });
});

describe("listTodos / getTodo", () => {
  it("should pass through to the repository", async () => {
    const todo = { id: 4, text: "x", done: false };
    const repo = mockRepo([todo]);
    expect(await makeListTodos(repo)()).toEqual([todo]);
    expect(await makeGetTodo(repo)(4)).toEqual(some(todo));
    expect(await makeGetTodo(repo)(5)).toEqual(none);
  });
});

describe("replaceTodo", () => {
  it("should overwrite done with its default when omitted", async () => {
    const repo = mockRepo([{ id: 2, text: "old", done: true }]);
    const result = await makeReplaceTodo(repo)(2, { text: "new" });

    expect(repo.update).toHaveBeenCalledWith({ id: 2, text: "new", done: false });
    expect(result).toEqual(some({ id: 2, text: "new", done: false }));
  });

  it("should return none and skip update for a missing id", async () => {
    const repo = mockRepo();
    expect(await makeReplaceTodo(repo)(2, { text: "new" })).toEqual(none);
    expect(repo.update).not.toHaveBeenCalled();
  });

  it("should validate before looking the todo up", async () => {
    const repo = mockRepo([{ id: 2, text: "old", done: false }]);
    await expect(makeReplaceTodo(repo)(2, { text: "" })).rejects.toThrow("text is required");
    expect(repo.get).not.toHaveBeenCalled();
  });
});

describe("deleteTodo", () => {
  it("should delete an existing todo", async () => {
    const repo = mockRepo([{ id: 3, text: "bye", done: false }]);
    expect(await makeDeleteTodo(repo)(3)).toBe(true);
    expect(repo.delete).toHaveBeenCalledWith(3);
  });

  it("should return false without calling delete for a missing id", async () => {
    const repo = mockRepo();
    expect(await makeDeleteTodo(repo)(3)).toBe(false);
    expect(repo.delete).not.toHaveBeenCalled();
  });
});
