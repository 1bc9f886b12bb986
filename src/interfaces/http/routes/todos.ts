import { Router } from "express";
import createTodoController, { TodoControllerDeps } from "../controllers/todoController";

export function todoRoutes(deps: TodoControllerDeps) {
  const controller = createTodoController(deps);
  const router = Router();

  router.get("/todos", controller.list);
  router.post("/todos", controller.create);
  router.options("/todos", controller.collectionOptions);
  router.get("/todos/:id", controller.get);
  router.put("/todos/:id", controller.replace);
  router.delete("/todos/:id", controller.remove);
  router.options("/todos/:id", controller.itemOptions);

  return router;
}
