import type { FastifyInstance } from "fastify";

export async function registerTopicRoutes(app: FastifyInstance) {
  app.get("/api/topics", async () => ({
    topics: app.catalog.topics.map((topic) => ({
      id: topic.id,
      label: topic.label,
      color: topic.color
    }))
  }));
}
