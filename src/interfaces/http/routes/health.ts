import { Router } from "express";
import { CountTodos, createHealthController } from "../controllers/healthController";

export function healthRoutes(countTodos: CountTodos) {
  const router = Router();
  router.get("/health", createHealthController(countTodos));
  return router;
}
