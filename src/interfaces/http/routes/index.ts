import { Router } from "express";
import { healthRoutes } from "./health";
import { todoRoutes } from "./todos";
import { TodoControllerDeps } from "../controllers/todoController";
import { CountTodos } from "../controllers/healthController";

export type HttpDeps = TodoControllerDeps & { countTodos: CountTodos };

export function makeHttpRouter(deps: HttpDeps) {
  const router = Router();

  router.use(healthRoutes(deps.countTodos));
  router.use(todoRoutes(deps));

  return router;
}
