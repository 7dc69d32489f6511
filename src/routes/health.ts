import type { FastifyInstance } from "fastify";

export const SERVICE_NAME = "tabular-analyst-backend";

export async function healthRoutes(app: FastifyInstance) {
  app.get("/health", async () => ({
    ok: true,
    service: SERVICE_NAME,
  }));
}
