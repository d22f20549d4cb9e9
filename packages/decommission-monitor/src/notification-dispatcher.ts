import {
  DeliveryError,
  describeError,
  requestWithRetry,
  type Logger,
  type MonitoredEntity,
  type NotificationEvent,
  type RetryPolicy,
  type ServiceMetrics,
  type ThresholdPolicy
} from "@decom-watch/shared";
import type { DeliveryChannel, DeliveryStatus, DeliveryStore } from "./delivery-store.js";
import {
  buildIssuePayload,
  buildWebhookPayload,
  renderAlertMessage,
  renderEscalationMessage,
  type TemplateContext
} from "./notification-templates.js";

export interface DispatcherConfig {
  serviceName: string;
  webhookUrl: string;
  issueTrackerUrl: string;
  ccEmail?: string;
  retry: RetryPolicy;
}

export interface DispatchContext {
  entity: MonitoredEntity;
  policy: ThresholdPolicy;
  lastActiveAtMs: number | null;
}

export interface ChannelOutcome {
  status: DeliveryStatus | "duplicate" | "not_required";
  attempts: number;
  error?: string;
}

export interface DispatchOutcome {
  eventId: string;
  message: string;
  escalation?: string;
  mandatoryDisposition: boolean;
  webhook: ChannelOutcome;
  issue: ChannelOutcome;
}

/**
 * Observes transitions and fans them out to the webhook and the issue tracker.
 * Delivery is best-effort: failures are recorded, never thrown back to the caller.
 */
export class NotificationDispatcher {
  constructor(
    private readonly config: DispatcherConfig,
    private readonly store: DeliveryStore,
    private readonly logger: Logger,
    private readonly metrics: ServiceMetrics
  ) {}

  async dispatch(event: NotificationEvent, context: DispatchContext): Promise<DispatchOutcome> {
    const templateContext: TemplateContext = {
      entity: context.entity,
      policy: context.policy,
      event,
      lastActiveAtMs: context.lastActiveAtMs,
      ccEmail: this.config.ccEmail
    };

    const message = renderAlertMessage(templateContext);
    const mandatoryDisposition = event.toStatus === "CRITICAL" && event.requiresManualReview;
    const escalation = mandatoryDisposition ? renderEscalationMessage(templateContext) : undefined;

    this.logger.info("alert transition", {
      event_id: event.id,
      entity_id: event.entityId,
      from: event.fromStatus,
      to: event.toStatus,
      idle_seconds: event.metricValue,
      reason: event.reason,
      requires_manual_review: event.requiresManualReview,
      message
    });
    if (escalation) {
      this.logger.warn("alert escalation", {
        event_id: event.id,
        entity_id: event.entityId,
        mandatory_disposition: true,
        escalation
      });
    }

    const webhook = await this.deliverWebhook(event, context.entity);
    const issue = await this.deliverIssue(event, templateContext);

    return {
      eventId: event.id,
      message,
      escalation,
      mandatoryDisposition,
      webhook,
      issue
    };
  }

  private async deliverWebhook(event: NotificationEvent, entity: MonitoredEntity): Promise<ChannelOutcome> {
    const payload = buildWebhookPayload(entity, event);
    try {
      const attempts = await this.send("webhook", this.config.webhookUrl, payload, event.id);
      await this.writeRecord(event, "webhook", "sent", attempts, { ...payload });
      return { status: "sent", attempts };
    } catch (error) {
      return this.recordFailure(event, "webhook", { ...payload }, error);
    }
  }

  private async deliverIssue(event: NotificationEvent, context: TemplateContext): Promise<ChannelOutcome> {
    if (!event.requiresManualReview || event.toStatus !== "CRITICAL") {
      return { status: "not_required", attempts: 0 };
    }

    const payload = buildIssuePayload(context);
    let claimed: boolean;
    try {
      claimed = await this.store.claimIssue(payload.dedupKey, event.entityId);
    } catch (error) {
      return this.recordFailure(event, "issue", { ...payload }, error);
    }

    if (!claimed) {
      this.logger.info("issue already created for transition", {
        event_id: event.id,
        entity_id: event.entityId
      });
      return { status: "duplicate", attempts: 0 };
    }

    try {
      const attempts = await this.send("issue", this.config.issueTrackerUrl, payload, payload.dedupKey);
      await this.writeRecord(event, "issue", "sent", attempts, { ...payload });
      return { status: "sent", attempts };
    } catch (error) {
      // Free the key so a later dispatch of the same transition can retry.
      await this.store.releaseIssue(payload.dedupKey).catch((releaseError: unknown) => {
        this.logger.error("issue ledger release failed", {
          event_id: event.id,
          error: describeError(releaseError)
        });
      });
      return this.recordFailure(event, "issue", { ...payload }, error);
    }
  }

  private async send(
    channel: DeliveryChannel,
    route: string,
    payload: object,
    idempotencyKey: string
  ): Promise<number> {
    if (route.startsWith("mock://")) {
      this.logger.info("mock route send", { channel, route, payload });
      this.metrics.notificationSentTotal.labels(this.config.serviceName, channel).inc();
      return 0;
    }

    const { attempts } = await requestWithRetry(
      route,
      {
        method: "POST",
        body: JSON.stringify(payload),
        headers: { "x-idempotency-key": idempotencyKey }
      },
      this.config.retry,
      {
        onRetry: (attempt, error, delayMs) => {
          this.metrics.deliveryRetriesTotal.labels(this.config.serviceName, channel).inc();
          this.logger.warn("delivery attempt failed, retrying", {
            channel,
            route,
            attempt,
            delay_ms: delayMs,
            error
          });
        }
      }
    );
    this.metrics.notificationSentTotal.labels(this.config.serviceName, channel).inc();
    return attempts;
  }

  private async recordFailure(
    event: NotificationEvent,
    channel: DeliveryChannel,
    payload: Record<string, unknown>,
    error: unknown
  ): Promise<ChannelOutcome> {
    const message = describeError(error);
    const attempts = error instanceof DeliveryError ? error.attempts : 0;

    this.metrics.notificationFailedTotal.labels(this.config.serviceName, channel).inc();
    this.logger.error("notification delivery failed", {
      event_id: event.id,
      entity_id: event.entityId,
      channel,
      attempts,
      error: message
    });
    await this.writeRecord(event, channel, "failed", attempts, payload, message);
    return { status: "failed", attempts, error: message };
  }

  private async writeRecord(
    event: NotificationEvent,
    channel: DeliveryChannel,
    status: DeliveryStatus,
    attempts: number,
    payload: Record<string, unknown>,
    errorMessage?: string
  ): Promise<void> {
    try {
      await this.store.record({
        eventId: event.id,
        entityId: event.entityId,
        channel,
        status,
        target: channel === "webhook" ? this.config.webhookUrl : this.config.issueTrackerUrl,
        attempts,
        payload,
        errorMessage,
        recordedAt: new Date().toISOString()
      });
    } catch (error) {
      this.logger.error("delivery log insert failed", {
        event_id: event.id,
        channel,
        error: describeError(error)
      });
    }
  }
}
