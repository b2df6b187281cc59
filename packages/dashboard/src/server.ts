import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import { DateTime } from "luxon";
import { registerCalendarRoutes } from "./routes/calendar.js";
import { registerNotificationRoutes } from "./routes/notifications.js";
import type {
  CalDAVHealth,
  CalendarSync,
  EventSnapshotStore,
  NotificationLoop,
  NotificationService,
} from "@calnotify/core";

/**
 * Anything that can report CalDAV reachability
 */
export interface HealthCheck {
  checkHealth(): Promise<CalDAVHealth>;
}

export interface ServerOptions {
  store: EventSnapshotStore;
  /** null when CalDAV is not configured */
  calendarSync: CalendarSync | null;
  healthCheck: HealthCheck | null;
  notificationLoop: NotificationLoop;
  notificationService: NotificationService;
  now?: () => DateTime;
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    snapshotStore: EventSnapshotStore;
    calendarSync: CalendarSync | null;
    healthCheck: HealthCheck | null;
    notificationLoop: NotificationLoop;
    notificationService: NotificationService;
    clock: () => DateTime;
  }
}

export async function createServer(
  options: ServerOptions,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: "info",
            transport: {
              target: "pino-pretty",
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          },
  });

  // Single-user app on localhost
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("snapshotStore", options.store);
  fastify.decorate("calendarSync", options.calendarSync);
  fastify.decorate("healthCheck", options.healthCheck);
  fastify.decorate("notificationLoop", options.notificationLoop);
  fastify.decorate("notificationService", options.notificationService);
  fastify.decorate("clock", options.now ?? (() => DateTime.now()));

  await registerCalendarRoutes(fastify);
  await registerNotificationRoutes(fastify);

  return fastify;
}

/**
 * Start the notification loop, then the calendar sync in the background.
 * The first sync may wait on a slow CalDAV server; nothing here waits for it.
 */
export function startDrivers(
  notificationLoop: NotificationLoop,
  calendarSync: CalendarSync | null,
): void {
  // Loop first so the first published snapshot triggers a tick
  notificationLoop.start();
  calendarSync?.start().catch((err) => {
    console.error("Calendar sync failed to start:", err);
  });
}
