import { NextFunction, Request, Response } from "express";
import { Todo } from "../../../core/entities/todo";
import { Option } from "../../../core/entities/option";

export interface TodoControllerDeps {
  createTodo: (input: unknown) => Promise<Todo>;
  listTodos: () => Promise<Todo[]>;
  getTodo: (id: number) => Promise<Option<Todo>>;
  replaceTodo: (id: number, input: unknown) => Promise<Option<Todo>>;
  deleteTodo: (id: number) => Promise<boolean>;
}

const ID_PATTERN = /^[1-9]\d*$/;

function parseId(req: Request, res: Response): number | null {
  const raw = req.params.id;
  if (!ID_PATTERN.test(raw) || !Number.isSafeInteger(Number(raw))) {
    res.status(400).json({ error: "id must be a positive integer" });
    return null;
  }
  return Number(raw);
}

const notFound = (res: Response) => res.status(404).json({ error: "Todo not found" });

export default function createTodoController(deps: TodoControllerDeps) {
  return {
    list: async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const items = await deps.listTodos();
        return res.status(200).json(items);
      } catch (e) {
        return next(e);
      }
    },

    get: async (req: Request, res: Response, next: NextFunction) => {
      const id = parseId(req, res);
      if (id === null) return;
      try {
        const item = await deps.getTodo(id);
        if (item.kind === "none") return notFound(res);
        return res.status(200).json(item.value);
      } catch (e) {
        return next(e);
      }
    },

    create: async (req: Request, res: Response, next: NextFunction) => {
      try {
        const created = await deps.createTodo(req.body);
        res.location(`/todos/${created.id}`);
        return res.status(201).json(created);
      } catch (e) {
        return next(e);
      }
    },

    replace: async (req: Request, res: Response, next: NextFunction) => {
      const id = parseId(req, res);
      if (id === null) return;
      try {
        const updated = await deps.replaceTodo(id, req.body);
        if (updated.kind === "none") return notFound(res);
        return res.status(200).json(updated.value);
      } catch (e) {
        return next(e);
      }
    },

    remove: async (req: Request, res: Response, next: NextFunction) => {
      const id = parseId(req, res);
      if (id === null) return;
      try {
        const ok = await deps.deleteTodo(id);
        if (!ok) return notFound(res);
        return res.sendStatus(204);
      } catch (e) {
        return next(e);
      }
    },

    // OPTIONS answers with capabilities only; the id is not looked up.
    collectionOptions: (_req: Request, res: Response) => {
      return res.status(200).set("Allow", "GET,POST,OPTIONS").json({});
    },

    itemOptions: (_req: Request, res: Response) => {
      return res.status(200).set("Allow", "GET,PUT,DELETE,OPTIONS").json({});
    },
  };
}
