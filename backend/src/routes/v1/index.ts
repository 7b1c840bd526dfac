import { Router } from "express";
import { createChatRouter, type ChatRouterOptions } from "./chat.js";

export function createV1Router(options: ChatRouterOptions): Router {
  const router = Router();

  router.use("/", createChatRouter(options));

  return router;
}
