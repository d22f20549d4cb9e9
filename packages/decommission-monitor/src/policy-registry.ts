import fs from "node:fs/promises";
import * as v from "valibot";
import {
  CRITICALITIES,
  ConfigError,
  SCENARIO_TYPES,
  describeError,
  type Criticality,
  type MonitoredEntity,
  type ScenarioType,
  type ThresholdPolicy
} from "@decom-watch/shared";

export interface TriggerWindow {
  warningSeconds: number;
  criticalSeconds: number;
}

export interface PolicyParameters {
  windows: Record<Criticality, TriggerWindow>;
  scenarioFactors: Record<ScenarioType, number>;
  warningRecoveryRatio: number;
  criticalRecoveryRatio: number;
  noDataWindowSeconds: number;
}

export const DEFAULT_POLICY_PARAMETERS: PolicyParameters = {
  windows: {
    CRITICAL: { warningSeconds: 43_200, criticalSeconds: 86_400 },
    MEDIUM: { warningSeconds: 172_800, criticalSeconds: 259_200 },
    LOW: { warningSeconds: 1_814_400, criticalSeconds: 2_592_000 }
  },
  scenarioFactors: {
    CONFIG_ONLY: 1,
    MIXED: 1,
    LOGIC_HEAVY: 1
  },
  warningRecoveryRatio: 0.8,
  criticalRecoveryRatio: 0.8,
  noDataWindowSeconds: 86_400
};

const secondsSchema = v.pipe(v.number(), v.integer(), v.minValue(1));

const ratioSchema = v.pipe(
  v.number(),
  v.check((value) => value > 0 && value < 1, "recovery ratio must be between 0 and 1 (exclusive)")
);

const factorSchema = v.pipe(
  v.number(),
  v.check((value) => Number.isFinite(value) && value > 0, "scenario factor must be a positive number")
);

const windowSchema = v.object({
  warning_seconds: secondsSchema,
  critical_seconds: secondsSchema
});

const thresholdsSchema = v.object({
  windows: v.optional(
    v.object({
      CRITICAL: v.optional(windowSchema),
      MEDIUM: v.optional(windowSchema),
      LOW: v.optional(windowSchema)
    })
  ),
  scenario_factors: v.optional(
    v.object({
      CONFIG_ONLY: v.optional(factorSchema),
      MIXED: v.optional(factorSchema),
      LOGIC_HEAVY: v.optional(factorSchema)
    })
  ),
  warning_recovery_ratio: v.optional(ratioSchema),
  critical_recovery_ratio: v.optional(ratioSchema),
  no_data_window_seconds: v.optional(secondsSchema)
});

const entitySchema = v.object({
  id: v.pipe(v.string(), v.trim(), v.minLength(1, "id must not be empty")),
  owner_email: v.pipe(v.string(), v.trim(), v.email("owner_email must be an email address")),
  criticality: v.picklist(CRITICALITIES, "criticality must be one of LOW, MEDIUM, CRITICAL"),
  scenario: v.picklist(SCENARIO_TYPES, "scenario must be one of CONFIG_ONLY, MIXED, LOGIC_HEAVY"),
  require_manual_review: v.optional(v.boolean())
});

export const policyDocumentSchema = v.object({
  thresholds: v.optional(thresholdsSchema),
  entities: v.array(entitySchema)
});

export type PolicyDocument = v.InferOutput<typeof policyDocumentSchema>;

export interface RegisteredEntity {
  entity: MonitoredEntity;
  policy: ThresholdPolicy;
}

export interface ReloadSummary {
  generation: number;
  added: string[];
  removed: string[];
  retained: string[];
}

interface RegistrySnapshot {
  generation: number;
  parameters: PolicyParameters;
  entries: ReadonlyMap<string, RegisteredEntity>;
}

function formatIssues(issues: v.BaseIssue<unknown>[]): string[] {
  return issues.map((issue) => {
    const path = v.getDotPath(issue);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function isCriticality(value: string): value is Criticality {
  return (CRITICALITIES as readonly string[]).includes(value);
}

function isScenario(value: string): value is ScenarioType {
  return (SCENARIO_TYPES as readonly string[]).includes(value);
}

function recoveryFor(triggerSeconds: number, ratio: number): number {
  return Math.min(triggerSeconds - 1, Math.floor(triggerSeconds * ratio + 1e-6));
}

export function requiresManualReview(entity: Pick<MonitoredEntity, "scenario" | "requireManualReview">): boolean {
  return entity.scenario === "LOGIC_HEAVY" || entity.requireManualReview === true;
}

/**
 * Derives the threshold policy for an entity from its criticality and scenario.
 * Throws ConfigError for values outside the declared enums.
 */
export function resolveThresholdPolicy(
  entity: Pick<MonitoredEntity, "criticality" | "scenario" | "requireManualReview">,
  parameters: PolicyParameters = DEFAULT_POLICY_PARAMETERS
): ThresholdPolicy {
  if (!isCriticality(entity.criticality)) {
    throw new ConfigError(`Unknown criticality: ${String(entity.criticality)}`);
  }
  if (!isScenario(entity.scenario)) {
    throw new ConfigError(`Unknown scenario type: ${String(entity.scenario)}`);
  }

  const window = parameters.windows[entity.criticality];
  const factor = parameters.scenarioFactors[entity.scenario];
  const warningSeconds = Math.max(1, Math.round(window.warningSeconds * factor));
  const criticalSeconds = Math.max(1, Math.round(window.criticalSeconds * factor));
  if (warningSeconds >= criticalSeconds) {
    throw new ConfigError(
      `Warning window must be shorter than critical window for ${entity.criticality}/${entity.scenario}`,
      [`warning=${warningSeconds}`, `critical=${criticalSeconds}`]
    );
  }

  const manual = requiresManualReview(entity);
  return {
    warningSeconds,
    criticalSeconds,
    warningRecoverySeconds: recoveryFor(warningSeconds, parameters.warningRecoveryRatio),
    criticalRecoverySeconds: recoveryFor(criticalSeconds, parameters.criticalRecoveryRatio),
    noDataWindowSeconds: parameters.noDataWindowSeconds,
    requiresManualReview: manual,
    autoReviewEligible: entity.scenario === "CONFIG_ONLY" && !manual
  };
}

function toParameters(thresholds: PolicyDocument["thresholds"]): PolicyParameters {
  const defaults = DEFAULT_POLICY_PARAMETERS;
  const windowFor = (criticality: Criticality): TriggerWindow => {
    const raw = thresholds?.windows?.[criticality];
    return raw
      ? { warningSeconds: raw.warning_seconds, criticalSeconds: raw.critical_seconds }
      : defaults.windows[criticality];
  };

  const parameters: PolicyParameters = {
    windows: {
      CRITICAL: windowFor("CRITICAL"),
      MEDIUM: windowFor("MEDIUM"),
      LOW: windowFor("LOW")
    },
    scenarioFactors: {
      CONFIG_ONLY: thresholds?.scenario_factors?.CONFIG_ONLY ?? defaults.scenarioFactors.CONFIG_ONLY,
      MIXED: thresholds?.scenario_factors?.MIXED ?? defaults.scenarioFactors.MIXED,
      LOGIC_HEAVY: thresholds?.scenario_factors?.LOGIC_HEAVY ?? defaults.scenarioFactors.LOGIC_HEAVY
    },
    warningRecoveryRatio: thresholds?.warning_recovery_ratio ?? defaults.warningRecoveryRatio,
    criticalRecoveryRatio: thresholds?.critical_recovery_ratio ?? defaults.criticalRecoveryRatio,
    noDataWindowSeconds: thresholds?.no_data_window_seconds ?? defaults.noDataWindowSeconds
  };

  const issues: string[] = [];
  for (const criticality of CRITICALITIES) {
    const window = parameters.windows[criticality];
    if (window.warningSeconds >= window.criticalSeconds) {
      issues.push(`thresholds.windows.${criticality}: warning_seconds must be less than critical_seconds`);
    }
  }
  const { windows, scenarioFactors } = parameters;
  if (windows.CRITICAL.criticalSeconds > windows.MEDIUM.criticalSeconds || windows.MEDIUM.criticalSeconds > windows.LOW.criticalSeconds) {
    issues.push("thresholds.windows: critical windows must not grow with criticality (CRITICAL <= MEDIUM <= LOW)");
  }
  if (scenarioFactors.LOGIC_HEAVY > scenarioFactors.MIXED || scenarioFactors.MIXED > scenarioFactors.CONFIG_ONLY) {
    issues.push("thresholds.scenario_factors: expected LOGIC_HEAVY <= MIXED <= CONFIG_ONLY");
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid threshold parameters", issues);
  }
  return parameters;
}

function buildSnapshot(raw: unknown, generation: number): RegistrySnapshot {
  const parsed = v.safeParse(policyDocumentSchema, raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid policy document", formatIssues(parsed.issues));
  }

  const parameters = toParameters(parsed.output.thresholds);
  const entries = new Map<string, RegisteredEntity>();
  const duplicates: string[] = [];

  for (const item of parsed.output.entities) {
    if (entries.has(item.id)) {
      duplicates.push(`entities: duplicate id ${item.id}`);
      continue;
    }
    const entity: MonitoredEntity = {
      id: item.id,
      ownerEmail: item.owner_email,
      criticality: item.criticality,
      scenario: item.scenario,
      requireManualReview: item.require_manual_review
    };
    entries.set(item.id, { entity, policy: resolveThresholdPolicy(entity, parameters) });
  }

  if (duplicates.length > 0) {
    throw new ConfigError("Invalid policy document", duplicates);
  }

  return { generation, parameters, entries };
}

export class PolicyRegistry {
  private snapshot: RegistrySnapshot;

  constructor(document: unknown) {
    this.snapshot = buildSnapshot(document, 1);
  }

  get generation(): number {
    return this.snapshot.generation;
  }

  get parameters(): PolicyParameters {
    return this.snapshot.parameters;
  }

  /**
   * Validates the whole document before swapping it in. On ConfigError the
   * current snapshot stays active.
   */
  reload(document: unknown): ReloadSummary {
    const previous = this.snapshot;
    const next = buildSnapshot(document, previous.generation + 1);

    const added: string[] = [];
    const retained: string[] = [];
    for (const id of next.entries.keys()) {
      (previous.entries.has(id) ? retained : added).push(id);
    }
    const removed = [...previous.entries.keys()].filter((id) => !next.entries.has(id));

    this.snapshot = next;
    return { generation: next.generation, added, removed, retained };
  }

  resolve(entity: MonitoredEntity): ThresholdPolicy {
    return resolveThresholdPolicy(entity, this.snapshot.parameters);
  }

  listEntities(): MonitoredEntity[] {
    return [...this.snapshot.entries.values()].map((entry) => entry.entity);
  }

  get(entityId: string): RegisteredEntity | undefined {
    return this.snapshot.entries.get(entityId);
  }

  has(entityId: string): boolean {
    return this.snapshot.entries.has(entityId);
  }

  get size(): number {
    return this.snapshot.entries.size;
  }
}

export async function readPolicyDocument(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read policy file ${filePath}`, [describeError(error)]);
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new ConfigError(`Policy file ${filePath} is not valid JSON`, [describeError(error)]);
  }
}
