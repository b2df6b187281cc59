import {
  findConfigDir,
  loadConfig,
  isCalDAVConfigured,
  createCalDAVSource,
  EventSnapshotStore,
  CalendarSync,
  NotificationService,
  NotificationLoop,
  ConsoleNotifier,
  SystemUrlOpener,
} from "@calnotify/core";
import type { CalDAVSource } from "@calnotify/core";
import { createServer, startDrivers } from "./server.js";

async function main() {
  // Find config directory
  const configDir = findConfigDir();
  const config = loadConfig(configDir);
  console.log(`Using configuration from ${configDir}`);

  const store = new EventSnapshotStore();

  // Calendar sync (only when CalDAV settings are present)
  let caldavSource: CalDAVSource | null = null;
  let calendarSync: CalendarSync | null = null;
  if (isCalDAVConfigured(config)) {
    caldavSource = createCalDAVSource(config.caldav);
    calendarSync = new CalendarSync({
      source: caldavSource,
      store,
      intervalMinutes: config.sync.intervalMinutes,
      syncHours: config.sync.syncHours,
      accountEmail: config.caldav.accountEmail,
    });
  } else {
    console.warn(
      "Warning: CalDAV is not configured. Add a caldav section to config.yaml to enable notifications.",
    );
  }

  // Notification delivery
  const notificationService = new NotificationService({
    notifier: new ConsoleNotifier(),
    urlOpener: new SystemUrlOpener(),
  });

  const notificationLoop = new NotificationLoop({
    store,
    service: notificationService,
    policy: config.notifications,
    checkIntervalMs: config.notifications.checkIntervalSeconds * 1000,
  });

  const server = await createServer({
    store,
    calendarSync,
    healthCheck: caldavSource,
    notificationLoop,
    notificationService,
  });

  startDrivers(notificationLoop, calendarSync);

  const { host, port } = config.dashboard;
  try {
    await server.listen({ port, host });
    console.log(`\nDashboard running at http://${host}:${port}`);
    console.log(
      `Notifying ${config.notifications.intervals.join(", ")} minutes before events.\n`,
    );
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      notificationLoop.stop();
      if (calendarSync) {
        calendarSync.stop();
      }

      await server.close();
      console.log("Server closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
