import express from "express";
import cors from "cors";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import { TodoRepository } from "./core/ports/TodoRepository";
import makeCreateTodo from "./core/use-cases/createTodo";
import makeListTodos from "./core/use-cases/listTodos";
import makeGetTodo from "./core/use-cases/getTodo";
import makeReplaceTodo from "./core/use-cases/replaceTodo";
import makeDeleteTodo from "./core/use-cases/deleteTodo";

import { HttpDeps, makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler } from "./interfaces/http/middlewares/errorHandler";

export function makeUseCases(repo: TodoRepository): HttpDeps {
  return {
    createTodo: makeCreateTodo(repo),
    listTodos: makeListTodos(repo),
    getTodo: makeGetTodo(repo),
    replaceTodo: makeReplaceTodo(repo),
    deleteTodo: makeDeleteTodo(repo),
    countTodos: () => repo.count(),
  };
}

export function createApp(repo: TodoRepository, options: { logFormat?: string } = {}) {
  const app = express();

  app.use(cors({ preflightContinue: true }));
  app.use(express.json({ limit: "1mb" }));
  if (options.logFormat) app.use(morgan(options.logFormat));

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.use(makeHttpRouter(makeUseCases(repo)));

  // Error handler (fallback)
  app.use(errorHandler);

  return app;
}
