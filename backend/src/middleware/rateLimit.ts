import rateLimit from "express-rate-limit";

export type ChatRateLimitOptions = {
  windowMs: number;
  max: number;
};

/** One bucket per chat user; requests without a user id share their client IP's bucket. */
export function createChatRateLimiter(options: ChatRateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: "rate_limited",
      message: "Too many messages, please try again later",
      retryInSeconds: Math.ceil(options.windowMs / 1000),
    },
    keyGenerator: (req) => {
      const userId = readUserId(req.body) ?? req.params.userId ?? req.query.userId;
      if (typeof userId === "string" || typeof userId === "number") {
        return `user:${userId}`;
      }
      return `ip:${req.ip ?? "unknown"}`;
    },
  });
}

function readUserId(body: unknown): number | undefined {
  if (typeof body === "object" && body !== null && "userId" in body) {
    const { userId } = body;
    return typeof userId === "number" ? userId : undefined;
  }
  return undefined;
}
