// backend/services/docs/src/controllers/hello/handlers/helloWorld.ts
import type { Request, Response } from "express";
import { sayHelloWorld } from "../../../services/helloWorldService";

export function helloWorld(_req: Request, res: Response) {
  res.json(sayHelloWorld());
}
