import cors from "cors";
import { getEnv } from "../config/env.js";

export function createCors() {
  const env = getEnv();

  return cors({
    origin: env.CORS_ORIGIN,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    maxAge: 86400,
  });
}
