import { Router, type RequestHandler } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import { requireAuthorizedUser } from "../../middleware/auth.js";
import { createChatRateLimiter, type ChatRateLimitOptions } from "../../middleware/rateLimit.js";
import type { ChatPipeline } from "../../services/chatPipeline.js";
import { chatRequestSchema, userIdSchema } from "../../types/contracts.js";

export type ChatRouterOptions = {
  pipeline: ChatPipeline;
  authorizedUsers: readonly number[];
  rateLimit?: ChatRateLimitOptions;
};

const userParamsSchema = z.object({ userId: userIdSchema });

export function createChatRouter(options: ChatRouterOptions): Router {
  const { pipeline } = options;
  const router = Router();
  const authorize = requireAuthorizedUser(options.authorizedUsers);
  const chatGuards: RequestHandler[] = options.rateLimit
    ? [authorize, createChatRateLimiter(options.rateLimit)]
    : [authorize];

  router.get("/start", authorize, (req, res) => {
    const { userId } = userParamsSchema.parse(req.query);
    res.json({ userId, message: pipeline.welcomeMessage() });
  });

  router.post(
    "/chat",
    ...chatGuards,
    asyncHandler(async (req, res) => {
      const { userId, text } = chatRequestSchema.parse(req.body);
      const reply = await pipeline.handleMessage(userId, text);
      res.json({ reply });
    })
  );

  router.get("/chat/:userId/history", authorize, (req, res) => {
    const { userId } = userParamsSchema.parse(req.params);
    res.json({ userId, exchanges: pipeline.getHistory(userId) });
  });

  router.delete("/chat/:userId/history", authorize, (req, res) => {
    const { userId } = userParamsSchema.parse(req.params);
    pipeline.resetHistory(userId);
    res.status(204).end();
  });

  router.get(
    "/status",
    authorize,
    asyncHandler(async (req, res) => {
      userParamsSchema.parse(req.query);
      res.json(await pipeline.getStatus());
    })
  );

  return router;
}
