/**
 * Notification API Routes
 *
 * Delivery history and the state of the notification loop.
 */

import type { FastifyInstance } from "fastify";
import type { NotificationRecord } from "@calnotify/core";

/**
 * Convert a history record to API response format
 */
function toResponse(record: NotificationRecord) {
  const base = {
    id: record.id,
    type: record.action.type,
    eventId: record.action.eventId,
    title: record.action.title,
    dispatchedAt: record.dispatchedAt.toISOString(),
    delivered: record.delivered,
    error: record.error,
  };

  if (record.action.type === "notify") {
    return {
      ...base,
      body: record.action.body,
      leadMinutes: record.action.leadMinutes,
      playSound: record.action.playSound,
    };
  }

  return {
    ...base,
    url: record.action.url,
  };
}

export async function registerNotificationRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // GET /api/notifications - Delivery history, newest first
  fastify.get("/api/notifications", async () => {
    const notifications = fastify.notificationService
      .getHistory()
      .map(toResponse);
    return { notifications };
  });

  // DELETE /api/notifications - Clear the history
  fastify.delete("/api/notifications", async () => {
    fastify.notificationService.clear();
    return { success: true };
  });

  // GET /api/notifications/status - Loop counters and policy intervals
  fastify.get("/api/notifications/status", async () => {
    return fastify.notificationLoop.getStatus();
  });
}
