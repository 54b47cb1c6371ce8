import twilio from "twilio";
import type { Logger } from "pino";
import type { ServiceConfig } from "../config.js";

export type OutboundMessage = {
  to: string;
  body: string;
};

export type DeliveryResult =
  | { to: string; ok: true; at: Date; sid: string | null }
  | { to: string; ok: false; at: Date; error: string };

export interface MessageSender {
  readonly name: string;
  sendAll(messages: readonly OutboundMessage[]): Promise<DeliveryResult[]>;
}

export type SmsClient = {
  messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
};

export class TwilioMessageSender implements MessageSender {
  readonly name = "twilio";

  constructor(
    private readonly client: SmsClient,
    private readonly fromNumber: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async sendAll(messages: readonly OutboundMessage[]): Promise<DeliveryResult[]> {
    const results: DeliveryResult[] = [];
    for (const message of messages) {
      try {
        const created = await this.client.messages.create({ body: message.body, from: this.fromNumber, to: message.to });
        // Stamped locally: the provider's dateCreated only has whole-second precision.
        results.push({ to: message.to, ok: true, at: this.now(), sid: created.sid });
      }
      catch (err) {
        this.logger.error({ err, to: message.to }, "SMS delivery failed");
        results.push({ to: message.to, ok: false, at: this.now(), error: err instanceof Error ? err.message : String(err) });
      }
    }
    return results;
  }
}

/** Used when no SMS credentials are configured: messages are only logged. */
export class LoggingMessageSender implements MessageSender {
  readonly name = "log";

  constructor(private readonly logger: Logger, private readonly now: () => Date = () => new Date()) {}

  async sendAll(messages: readonly OutboundMessage[]): Promise<DeliveryResult[]> {
    return messages.map((message) => {
      this.logger.info({ to: message.to, body: message.body }, "SMS (not sent, no provider configured)");
      return { to: message.to, ok: true, at: this.now(), sid: null };
    });
  }
}

export function createMessageSender(
  config: Pick<ServiceConfig, "TWILIO_ACCOUNT_SID" | "TWILIO_AUTH_TOKEN" | "TWILIO_FROM_NUMBER">,
  logger: Logger
): MessageSender {
  const { TWILIO_ACCOUNT_SID: accountSid, TWILIO_AUTH_TOKEN: authToken, TWILIO_FROM_NUMBER: fromNumber } = config;
  if (accountSid && authToken && fromNumber) {
    return new TwilioMessageSender(twilio(accountSid, authToken), fromNumber, logger);
  }
  logger.warn("Twilio credentials not set, SMS messages will only be logged");
  return new LoggingMessageSender(logger);
}
