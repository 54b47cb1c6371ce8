import { config as loadEnv } from "dotenv";
import path from "node:path";
import cron from "node-cron";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { db } from "./lib/fire.js";
import { createLogger } from "./logger.js";
import { PipelineRunner } from "./pipeline.js";
import { AlertGate } from "./services/alertGate.js";
import { AlertTracker } from "./services/alertTracker.js";
import { FirestoreContactDirectory } from "./services/contacts.js";
import { createMessageSender } from "./services/messaging.js";
import { NotificationDispatcher } from "./services/notifications.js";
import { ReportService } from "./services/reports.js";
import { SensorRegistry } from "./services/sensorRegistry.js";
import { SubscriberResolver } from "./services/subscriberResolver.js";

const envFiles = [".env", ".env.local"];
for (const file of envFiles) {
  loadEnv({ path: path.resolve(process.cwd(), file), override: true });
}

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger(config);

  const firestore = db(config.FIRESTORE_PROJECT_ID);
  const sensors = new SensorRegistry({ db: firestore });
  const runner = new PipelineRunner(config, {
    sensors,
    resolver: new SubscriberResolver({ db: firestore, sensors, utmZone: config.UTM_ZONE }),
    gate: new AlertGate({ db: firestore }),
    tracker: new AlertTracker({ db: firestore }),
    reports: new ReportService({ db: firestore }),
    dispatcher: new NotificationDispatcher({
      db: firestore,
      contacts: new FirestoreContactDirectory({ db: firestore }),
      sender: createMessageSender(config, logger)
    })
  }, logger);

  const fastify = await buildApp({ runner, logLevel: config.LOG_LEVEL });

  const schedule = config.CRON_SCHEDULE;
  if (schedule) {
    cron.schedule(schedule, async () => {
      fastify.log.info({ schedule }, "Running scheduled alert pipeline");
      try {
        await runner.run();
      }
      catch (err) {
        fastify.log.error({ err }, "Scheduled pipeline run failed");
      }
    });
  }

  if (config.RUN_ON_START) {
    void runner.run().catch((err) => {
      fastify.log.error({ err }, "Initial pipeline run failed");
    });
  }

  const close = async () => {
    fastify.log.info("Shutting down");
    await fastify.close();
    process.exit(0);
  };

  process.on("SIGINT", close);
  process.on("SIGTERM", close);

  try {
    await fastify.listen({
      port: config.port,
      host: config.host
    });
    fastify.log.info(`Alert service listening on http://${config.host}:${config.port}`);
  }
  catch (err) {
    fastify.log.error({ err }, "Failed to start alert service");
    process.exit(1);
  }
}

void bootstrap();
