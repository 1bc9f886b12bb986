import { NextFunction, Request, Response } from "express";

export type CountTodos = () => Promise<number>;

export const createHealthController = (countTodos: CountTodos) =>
  async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const todos = await countTodos();
      return res.status(200).json({ status: "ok", uptime: process.uptime(), todos });
    } catch (e) {
      return next(e);
    }
  };
