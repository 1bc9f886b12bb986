export interface Todo {
  id: number;
  text: string;
  done: boolean;
}

export interface TodoCreate {
  text: string;
  done?: boolean;
}

export function createTodo(params: { id: number } & TodoCreate): Todo {
  return {
    id: params.id,
    text: params.text,
    done: params.done ?? false,
  };
}

export function isValidTodoId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}
