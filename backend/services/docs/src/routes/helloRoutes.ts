// backend/services/docs/src/routes/helloRoutes.ts
import { Router } from "express";
import { ping } from "../controllers/hello/handlers/ping";
import { helloWorld } from "../controllers/hello/handlers/helloWorld";

export function helloRoutes(): Router {
  const router = Router();
  router.get("/ping", ping);
  router.get("/hello_world", helloWorld);
  return router;
}
