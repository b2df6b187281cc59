/**
 * Calendar API Routes
 *
 * Read-only views over the current event snapshot, a manual sync trigger
 * and the CalDAV health endpoint.
 */

import type { FastifyInstance } from "fastify";
import {
  findNextEvent,
  getMeetingUrl,
  type CalDAVHealth,
  type NormalizedEvent,
} from "@calnotify/core";

// ─── Response Types ───

interface EventResponse {
  id: string;
  uid: string;
  title: string;
  start: string;
  end: string;
  timeZone: string;
  allDay: boolean;
  location?: string;
  url: string | null;
  isModifiedOccurrence: boolean;
  participationStatus?: string;
  isDeclined: boolean;
}

interface EventsResponse {
  events: EventResponse[];
  syncedAt: string | null;
}

interface NextEventResponse {
  event: EventResponse | null;
  start?: string;
  minutesUntilStart?: number;
}

interface SyncResponse {
  ok: boolean;
  eventCount: number;
  error?: string;
}

interface CalendarHealth {
  status: "healthy" | "offline" | "unconfigured";
  caldav: CalDAVHealth;
  lastSync: string | null;
}

/**
 * Convert a snapshot event to its API form. Times keep the event's own offset.
 */
function toEventResponse(event: NormalizedEvent): EventResponse {
  return {
    id: event.id,
    uid: event.uid,
    title: event.title,
    start: event.start.toISO() ?? "",
    end: event.end.toISO() ?? "",
    timeZone: event.start.zoneName ?? "UTC",
    allDay: event.allDay,
    location: event.location,
    url: getMeetingUrl(event),
    isModifiedOccurrence: event.isModifiedOccurrence,
    participationStatus: event.participationStatus,
    isDeclined: event.isDeclined,
  };
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  /**
   * GET /api/calendar/events
   *
   * The events the notifier currently works from
   */
  fastify.get<{ Reply: EventsResponse }>("/api/calendar/events", async () => {
    const snapshot = fastify.snapshotStore.get();
    return {
      events: snapshot.events.map(toEventResponse),
      syncedAt: snapshot.syncedAt?.toISO() ?? null,
    };
  });

  /**
   * GET /api/calendar/next
   *
   * The nearest upcoming event, with recurring series moved to today
   */
  fastify.get<{ Reply: NextEventResponse }>("/api/calendar/next", async () => {
    const next = findNextEvent(fastify.snapshotStore.events, fastify.clock());
    if (!next) {
      return { event: null };
    }

    return {
      event: toEventResponse(next.event),
      start: next.start.toISO() ?? undefined,
      minutesUntilStart: Math.round(next.minutesUntilStart * 10) / 10,
    };
  });

  /**
   * POST /api/calendar/sync
   *
   * Fetch and publish a fresh snapshot now
   */
  fastify.post("/api/calendar/sync", async (request, reply) => {
    const sync = fastify.calendarSync;
    if (!sync) {
      return reply.code(503).send({ error: "CalDAV is not configured" });
    }

    const result = await sync.syncNow();
    request.log.info(
      { ok: result.ok, eventCount: result.eventCount },
      "Manual calendar sync",
    );

    const response: SyncResponse = {
      ok: result.ok,
      eventCount: result.eventCount,
      error: result.error,
    };
    return response;
  });

  /**
   * GET /api/calendar/health
   *
   * Returns calendar system health status
   */
  fastify.get<{ Reply: CalendarHealth }>("/api/calendar/health", async () => {
    const lastSync = fastify.calendarSync?.getStatus().lastSuccessAt ?? null;
    const checker = fastify.healthCheck;

    if (!checker) {
      return {
        status: "unconfigured",
        caldav: {
          reachable: false,
          error: "CalDAV is not configured",
        },
        lastSync,
      };
    }

    const health = await checker.checkHealth();
    const status: CalendarHealth["status"] = health.reachable
      ? "healthy"
      : "offline";

    return {
      status,
      caldav: health,
      lastSync,
    };
  });

  /**
   * GET /api/calendar/sync/status
   */
  fastify.get("/api/calendar/sync/status", async (request, reply) => {
    const sync = fastify.calendarSync;
    if (!sync) {
      return reply.code(503).send({ error: "CalDAV is not configured" });
    }
    return sync.getStatus();
  });
}
