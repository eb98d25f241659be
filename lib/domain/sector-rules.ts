import { getHours } from "date-fns";
import { ValidationError } from "./errors";

export interface BookingCandidate {
  scheduledAt: Date;
  notes?: string | null;
  serviceType?: string | null;
}

export interface RuleViolation {
  code: string;
  message: string;
}

export type SectorRule = (candidate: BookingCandidate) => RuleViolation | null;

export type SectorRuleRegistry = ReadonlyMap<string, readonly SectorRule[]>;

export const LABORATORY_OPENING_HOUR = 8;
export const LABORATORY_CLOSING_HOUR = 18;

function notesMention(candidate: BookingCandidate, marker: string): boolean {
  return (candidate.notes ?? "").toLowerCase().includes(marker);
}

export const withinLaboratoryHours: SectorRule = ({ scheduledAt }) => {
  const hour = getHours(scheduledAt);
  if (hour >= LABORATORY_OPENING_HOUR && hour < LABORATORY_CLOSING_HOUR) {
    return null;
  }
  return { code: "OUTSIDE_OPERATING_HOURS", message: "outside operating hours" };
};

export const requiresPickupLocation: SectorRule = (candidate) =>
  notesMention(candidate, "pickup") ? null : { code: "MISSING_PICKUP_LOCATION", message: "missing pickup location" };

export const requiresCheckoutDate: SectorRule = (candidate) =>
  notesMention(candidate, "check-out") ? null : { code: "MISSING_CHECKOUT_DATE", message: "missing check-out date" };

export function normalizeSector(sector: string): string {
  return sector.trim().toLowerCase();
}

export function createSectorRuleRegistry(
  entries: Record<string, readonly SectorRule[]> = {},
): SectorRuleRegistry {
  const registry = new Map<string, readonly SectorRule[]>();
  for (const [sector, rules] of Object.entries(entries)) {
    registry.set(normalizeSector(sector), rules);
  }
  return registry;
}

export const defaultSectorRules: SectorRuleRegistry = createSectorRuleRegistry({
  laboratory: [withinLaboratoryHours],
  transportation: [requiresPickupLocation],
  hospitality: [requiresCheckoutDate],
});

/**
 * Returns a new registry with `rule` appended to the sector's rules.
 * The input registry is left untouched.
 */
export function registerSectorRule(registry: SectorRuleRegistry, sector: string, rule: SectorRule): SectorRuleRegistry {
  const key = normalizeSector(sector);
  const next = new Map(registry);
  next.set(key, [...(registry.get(key) ?? []), rule]);
  return next;
}

export function findSectorViolation(
  registry: SectorRuleRegistry,
  sector: string,
  candidate: BookingCandidate,
): RuleViolation | null {
  for (const rule of registry.get(normalizeSector(sector)) ?? []) {
    const violation = rule(candidate);
    if (violation) {
      return violation;
    }
  }
  return null;
}

export function assertSectorRules(registry: SectorRuleRegistry, sector: string, candidate: BookingCandidate): void {
  const violation = findSectorViolation(registry, sector, candidate);
  if (violation) {
    throw new ValidationError(violation.code, violation.message);
  }
}
