import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { PipelineRunSummary, ReportSummary, SpikeEvent } from "@aq-alerts/types";
import type { ServiceConfig } from "./config.js";
import { uniqueSorted } from "./lib/docs.js";
import { ReportError } from "./lib/errors.js";
import { newAlertMessage, reportMessage } from "./messages.js";
import { fetchTelemetry } from "./purpleAirClient.js";
import { classifyTelemetry } from "./quality.js";
import { extractSpikes } from "./spikes.js";
import type { AlertGate } from "./services/alertGate.js";
import type { AlertTracker } from "./services/alertTracker.js";
import type { NotificationDispatcher } from "./services/notifications.js";
import type { ReportService } from "./services/reports.js";
import type { SensorRegistry } from "./services/sensorRegistry.js";
import type { SubscriberResolver } from "./services/subscriberResolver.js";

export type PipelineConfig = Pick<
  ServiceConfig,
  | "PURPLEAIR_API_KEY"
  | "PURPLEAIR_API_URL"
  | "LOCAL_TIME_ZONE"
  | "LAST_SEEN_OFFSET_HOURS"
  | "API_TIMEOUT_MS"
  | "SPIKE_THRESHOLD"
  | "PROXIMITY_METERS"
  | "STALE_AFTER_MINUTES"
  | "READING_CEILING"
>;

export type PipelineDependencies = {
  sensors: SensorRegistry;
  resolver: SubscriberResolver;
  gate: AlertGate;
  tracker: AlertTracker;
  reports: ReportService;
  dispatcher: NotificationDispatcher;
  fetchTelemetry?: typeof fetchTelemetry;
  newReportId?: () => string;
  now?: () => Date;
};

export class PipelineRunner {
  private readonly config: PipelineConfig;
  private readonly deps: PipelineDependencies;
  private readonly logger: Logger;
  private inFlight: Promise<PipelineRunSummary> | null = null;
  private last: PipelineRunSummary | null = null;

  constructor(config: PipelineConfig, deps: PipelineDependencies, logger: Logger) {
    this.config = config;
    this.deps = deps;
    this.logger = logger;
  }

  get lastSummary(): PipelineRunSummary | null {
    return this.last;
  }

  /** Runs once; a call made while a run is in flight joins that run. */
  run(): Promise<PipelineRunSummary> {
    if (this.inFlight) return this.inFlight;
    const job = this.runInternal()
      .then((summary) => {
        this.last = summary;
        return summary;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = job;
    return job;
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async runInternal(): Promise<PipelineRunSummary> {
    const { sensors, resolver, gate, tracker, reports, dispatcher } = this.deps;
    const fetcher = this.deps.fetchTelemetry ?? fetchTelemetry;

    const sensorIds = await sensors.listSensorIds();
    this.logger.info({ sensors: sensorIds.length }, "Starting alert pipeline run");

    const { runtime, threshold, records } = await fetcher(this.config, sensorIds, this.config.SPIKE_THRESHOLD, { now: this.deps.now });
    const quality = classifyTelemetry(records, runtime.localTime, {
      staleAfterMinutes: this.config.STALE_AFTER_MINUTES,
      readingCeiling: this.config.READING_CEILING
    });
    const spikes = extractSpikes(quality.clean, threshold);
    this.logger.info({
      clean: quality.clean.length,
      flagged: quality.flagged.length,
      unusable: quality.unusable.length,
      spikes: spikes.length
    }, "Classified telemetry");

    const spikesByUser = new Map<number, SpikeEvent[]>();
    for (const spike of spikes) {
      const users = await resolver.usersNearSensor(spike.sensorIndex, this.config.PROXIMITY_METERS);
      for (const recordId of users) {
        const list = spikesByUser.get(recordId) ?? [];
        list.push(spike);
        spikesByUser.set(recordId, list);
      }
    }

    const candidates = [...spikesByUser.keys()].sort((a, b) => a - b);
    const fresh = new Set(await gate.usersForNewAlert(candidates));
    const ending = (await tracker.listOpenAlertOwners()).filter((recordId) => !spikesByUser.has(recordId));
    const awaiting = await tracker.listRecordsAwaitingReport();

    // Contacts are resolved before any alert or report is written, so a failed lookup leaves no state behind.
    const contacts = await dispatcher.resolveContacts([...fresh, ...ending, ...awaiting]);

    const recipients: number[] = [];
    const messages: string[] = [];
    const openedAlerts: number[] = [];
    const extendedAlerts: number[] = [];
    const now = this.now();

    for (const recordId of candidates) {
      const userSpikes = spikesByUser.get(recordId) ?? [];
      if (fresh.has(recordId)) {
        const alertId = await tracker.openAlert(recordId, userSpikes, now);
        if (!alertId) continue;
        openedAlerts.push(recordId);
        recipients.push(recordId);
        messages.push(newAlertMessage(userSpikes));
      }
      else if ((await tracker.extendAlerts(recordId, userSpikes, now)).length) {
        extendedAlerts.push(recordId);
      }
    }

    const closedAlerts: number[] = [];
    for (const recordId of ending) {
      if ((await tracker.closeAlerts(recordId, now)).length) closedAlerts.push(recordId);
    }

    const reportSummaries: ReportSummary[] = [];
    const newReportId = this.deps.newReportId ?? randomUUID;
    for (const recordId of uniqueSorted([...awaiting, ...closedAlerts])) {
      const reportId = newReportId();
      try {
        const { durationMinutes, maxReading } = await reports.initializeReport(recordId, reportId);
        reportSummaries.push({ recordId, reportId, durationMinutes, maxReading });
        recipients.push(recordId);
        messages.push(reportMessage(durationMinutes, maxReading));
      }
      catch (err) {
        if (!(err instanceof ReportError)) throw err;
        this.logger.warn({ err, recordId }, "Skipping report");
      }
    }

    const dispatch = await dispatcher.dispatch(recipients, messages, contacts);
    if (dispatch.contactFailures.length || dispatch.deliveryFailures.length) {
      this.logger.warn({
        contactFailures: dispatch.contactFailures,
        deliveryFailures: dispatch.deliveryFailures
      }, "Some messages were not delivered");
    }

    const summary: PipelineRunSummary = {
      startedAt: runtime.startedAt.toISOString(),
      localTime: runtime.localTime.toISOString().replace("Z", ""),
      timeZone: runtime.timeZone,
      sensorsQueried: sensorIds.length,
      cleanCount: quality.clean.length,
      flaggedSensorIds: quality.flaggedSensorIds,
      spikes,
      openedAlerts,
      extendedAlerts,
      closedAlerts,
      reports: reportSummaries,
      dispatch,
      completedAt: this.now().toISOString()
    };
    this.logger.info({
      opened: openedAlerts.length,
      extended: extendedAlerts.length,
      closed: closedAlerts.length,
      reports: reportSummaries.length,
      delivered: dispatch.delivered
    }, "Alert pipeline run complete");
    return summary;
  }
}
