import {
  statusRank,
  type IssuePayload,
  type MonitoredEntity,
  type NotificationEvent,
  type ThresholdPolicy,
  type WebhookPayload
} from "@decom-watch/shared";

export interface TemplateContext {
  entity: MonitoredEntity;
  policy: ThresholdPolicy;
  event: NotificationEvent;
  lastActiveAtMs: number | null;
  ccEmail?: string;
}

export function formatDays(seconds: number): string {
  return (seconds / 86_400).toFixed(1);
}

export function formatDuration(seconds: number): string {
  return `${seconds} seconds (${formatDays(seconds)} days)`;
}

function ownerHandle(email: string): string {
  const at = email.indexOf("@");
  return at > 0 ? email.slice(0, at) : email;
}

/** The bound the transition crossed. */
export function thresholdFor(event: NotificationEvent, policy: ThresholdPolicy): number {
  if (event.toStatus === "CRITICAL") return policy.criticalSeconds;
  if (event.toStatus === "WARNING") {
    return event.fromStatus === "CRITICAL" ? policy.criticalRecoverySeconds : policy.warningSeconds;
  }
  return policy.warningRecoverySeconds;
}

export function isRecovery(event: NotificationEvent): boolean {
  return statusRank(event.toStatus) < statusRank(event.fromStatus);
}

function headline(event: NotificationEvent): string {
  if (isRecovery(event)) return "Database Activity Recovered";
  if (event.toStatus === "CRITICAL") return "Database Decommissioning Candidate Detected";
  return "Database Inactivity Warning";
}

function nextSteps(entity: MonitoredEntity, policy: ThresholdPolicy): string[] {
  const lines: string[] = [];
  if (policy.requiresManualReview) {
    lines.push("Manual review required before any action");
  }
  if (entity.scenario === "LOGIC_HEAVY") {
    lines.push("Logic-heavy scenario - review business logic impact");
  } else if (entity.scenario === "MIXED") {
    lines.push("Mixed scenario - check service layer dependencies");
  } else if (policy.autoReviewEligible) {
    lines.push("Config-only scenario - safe for automated review");
  } else {
    lines.push("Config-only scenario - owner confirmation required");
  }
  return lines;
}

export function renderAlertMessage(context: TemplateContext): string {
  const { entity, policy, event } = context;
  const threshold = thresholdFor(event, policy);
  const mentions = [`@${entity.ownerEmail}`];
  if (context.ccEmail) {
    mentions.push(`@${context.ccEmail}`);
  }

  const details = [
    `- No active connections detected for ${formatDuration(event.metricValue)}`,
    `- Threshold: ${formatDuration(threshold)}`,
    `- Owner: ${entity.ownerEmail}`
  ];
  if (event.reason === "no_data") {
    details.push(`- No activity data received within the ${policy.noDataWindowSeconds} second no-data window`);
  }

  return [
    `**${headline(event)}** (${event.fromStatus} -> ${event.toStatus})`,
    "",
    `Database: ${entity.id}`,
    `Scenario Type: ${entity.scenario}`,
    `Criticality: ${entity.criticality}`,
    "",
    "**Alert Details:**",
    ...details,
    "",
    "**Next Steps:**",
    ...nextSteps(entity, policy).map((line) => `- ${line}`),
    "",
    "**Decommissioning Workflow:**",
    "1. Verify no hidden dependencies",
    `2. Contact owner: ${entity.ownerEmail}`,
    policy.requiresManualReview ? "3. Create issue for manual review" : "3. Evaluate for removal",
    "4. Document decision and rationale",
    "",
    mentions.join(" ")
  ].join("\n");
}

export function renderEscalationMessage(context: TemplateContext): string {
  const { entity, event } = context;
  const lines = [
    "**ESCALATION: Unused Database Alert**",
    "",
    `Database ${entity.id} has been without connections for ${formatDays(event.metricValue)} days.`
  ];
  if (entity.criticality === "CRITICAL") {
    lines.push("This is a CRITICAL system requiring immediate review.");
  }
  lines.push(
    "",
    "Manual disposition is mandatory; this alert is never closed automatically.",
    "Please review for potential decommissioning."
  );
  return lines.join("\n");
}

export function buildIssuePayload(context: TemplateContext): IssuePayload {
  const { entity, event } = context;
  const lastActivity = context.lastActiveAtMs === null ? "unknown" : new Date(context.lastActiveAtMs).toISOString();
  const labels = ["database-decommissioning", entity.scenario.toLowerCase(), entity.criticality.toLowerCase()];
  const title = `Database Decommissioning Review: ${entity.id}`;

  const body = [
    `## ${title}`,
    "",
    "**Database Information:**",
    `- Name: ${entity.id}`,
    `- Scenario: ${entity.scenario}`,
    `- Criticality: ${entity.criticality}`,
    `- Owner: ${entity.ownerEmail}`,
    "",
    "**Alert Details:**",
    `- No connections for ${formatDays(event.metricValue)} days`,
    `- Last activity: ${lastActivity}`,
    `- Transition: ${event.fromStatus} -> ${event.toStatus} at ${event.occurredAt}`,
    "",
    "**Required Actions:**",
    "- [ ] Verify no hidden dependencies",
    "- [ ] Check application logs for references",
    "- [ ] Contact database owner",
    entity.scenario === "LOGIC_HEAVY" ? "- [ ] Review business logic impact" : "- [ ] Confirm safe removal",
    "- [ ] Document decommissioning decision",
    "",
    `**Owner:** @${ownerHandle(entity.ownerEmail)}`,
    `**Labels:** ${labels.join(", ")}`
  ].join("\n");

  return { title, body, labels, dedupKey: event.id };
}

export function buildWebhookPayload(entity: MonitoredEntity, event: NotificationEvent): WebhookPayload {
  return {
    database_name: entity.id,
    scenario_type: entity.scenario,
    criticality: entity.criticality,
    owner_email: entity.ownerEmail,
    alert_timestamp: event.occurredAt,
    metric_value: event.metricValue,
    requires_manual_review: event.requiresManualReview
  };
}
