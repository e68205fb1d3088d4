// backend/services/docs/src/controllers/hello/handlers/ping.ts
import type { Request, Response } from "express";

export function ping(_req: Request, res: Response) {
  res.json("pong");
}
