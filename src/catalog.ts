/**
 * Provider catalog and balancing limits.
 *
 * The catalog classifies provider names into core, supplemental, oversight
 * and secondary (last-resort) providers. Limits hold the hour bounds the
 * balancer enforces. Both are configuration: validated with zod and turned
 * into {@link ConfigurationError}s when invalid.
 *
 * @example
 * ```typescript
 * const catalog = resolveCatalog({
 *   supplementalProviders: [
 *     "Morgan Hale, RN/House Manager",
 *     "Riley Park, RN/Program Manager",
 *     "Casey Brook, RN/House Supervisor",
 *   ],
 *   oversightProviders: ["Morgan Hale, RN/House Manager", "Riley Park, RN/Program Manager"],
 *   secondaryProviders: ["Taylor Quinn, LPN"],
 *   secondaryEligibleIndividuals: ["OT"],
 * });
 * const limits = resolveLimits({ maxHours: 12 });
 * ```
 *
 * @module
 */

import * as z from "zod";
import { ConfigurationError } from "./errors.js";

// ============================================================================
// Schemas
// ============================================================================

const NameSchema = z.string().trim().min(1);

const ProviderCatalogSchema = z.object({
  coreProviders: z.array(NameSchema).default([]),
  supplementalProviders: z.array(NameSchema).min(1, "At least one supplemental provider is required"),
  oversightProviders: z.array(NameSchema).min(1, "At least one oversight provider is required"),
  secondaryProviders: z.array(NameSchema).default([]),
  secondaryEligibleIndividuals: z.array(NameSchema).default([]),
});

const BalancingLimitsSchema = z.object({
  targetHours: z.number().positive().default(24),
  minHours: z.number().min(0).default(2),
  maxHours: z.number().positive().default(16),
  escalatedMaxHours: z.number().positive().default(18),
  oversightHours: z.number().positive().default(8),
  oversightWindowDays: z.number().int().positive().default(7),
});

/**
 * Provider catalog as supplied by the caller.
 *
 * - `coreProviders`: regular staff; never added by the balancer and never on another roster
 * - `supplementalProviders` (required): role holders used to fill gaps, in priority order
 * - `oversightProviders` (required): supplemental providers whose periodic
 *   entries satisfy the weekly oversight requirement, in priority order
 * - `secondaryProviders`: last-resort providers, only used by the exception ladder
 * - `secondaryEligibleIndividuals`: the only individuals secondary providers may cover
 *
 * @category Configuration
 */
export type ProviderCatalog = z.input<typeof ProviderCatalogSchema>;

/**
 * Validated catalog with defaults applied.
 *
 * @category Configuration
 */
export type ResolvedCatalog = z.output<typeof ProviderCatalogSchema>;

/**
 * Hour limits applied by the balancer.
 *
 * - `targetHours` (default 24): required coverage per individual per day
 * - `minHours` (default 2): lower bound for an active provider's daily total
 * - `maxHours` (default 16): base cap for a provider's daily total
 * - `escalatedMaxHours` (default 18): cap after the exception ladder escalates
 * - `oversightHours` (default 8): length of a qualifying oversight entry
 * - `oversightWindowDays` (default 7): rolling window for the oversight check
 *
 * @category Configuration
 */
export type BalancingLimits = z.output<typeof BalancingLimitsSchema>;

export type BalancingLimitsInput = z.input<typeof BalancingLimitsSchema>;

export const DEFAULT_LIMITS: BalancingLimits = BalancingLimitsSchema.parse({});

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveCatalogOptions {
  /** Secondary providers supplied at runtime, appended after the configured ones. */
  additionalSecondaryProviders?: string[];
}

/**
 * Validates a catalog and merges runtime secondary providers into it.
 *
 * @throws {ConfigurationError} When a required field is missing, an oversight
 *   provider is not also a supplemental provider, a core provider appears on
 *   another roster, or a roster repeats a name.
 */
export function resolveCatalog(
  catalog: ProviderCatalog,
  options: ResolveCatalogOptions = {},
): ResolvedCatalog {
  const parsed = parseOrThrow(ProviderCatalogSchema, catalog, "Invalid provider catalog");

  const secondaryProviders = dedupe([
    ...parsed.secondaryProviders,
    ...(options.additionalSecondaryProviders ?? []).map((name) => name.trim()).filter(Boolean),
  ]);

  assertUnique(parsed.coreProviders, "coreProviders");
  assertUnique(parsed.supplementalProviders, "supplementalProviders");
  assertUnique(parsed.oversightProviders, "oversightProviders");

  const supplemental = new Set(parsed.supplementalProviders);
  for (const name of parsed.oversightProviders) {
    if (!supplemental.has(name)) {
      throw new ConfigurationError(
        `Oversight provider "${name}" must also be listed as a supplemental provider`,
        "oversightProviders",
      );
    }
  }

  for (const name of secondaryProviders) {
    if (supplemental.has(name)) {
      throw new ConfigurationError(
        `Secondary provider "${name}" cannot also be a supplemental provider`,
        "secondaryProviders",
      );
    }
  }

  const rosters = new Set([...parsed.supplementalProviders, ...secondaryProviders]);
  for (const name of parsed.coreProviders) {
    if (rosters.has(name)) {
      throw new ConfigurationError(
        `Core provider "${name}" cannot also be a supplemental or secondary provider`,
        "coreProviders",
      );
    }
  }

  if (secondaryProviders.length > 0 && parsed.secondaryEligibleIndividuals.length === 0) {
    throw new ConfigurationError(
      "Secondary providers are configured but no individual is eligible for them",
      "secondaryEligibleIndividuals",
    );
  }

  return { ...parsed, secondaryProviders };
}

/**
 * Applies defaults to partial limits and checks that the bounds are ordered.
 *
 * @throws {ConfigurationError} When a value is out of range or
 *   `minHours <= oversightHours <= maxHours <= escalatedMaxHours` does not hold.
 */
export function resolveLimits(limits: BalancingLimitsInput = {}): BalancingLimits {
  const parsed = parseOrThrow(BalancingLimitsSchema, limits, "Invalid balancing limits");

  if (parsed.minHours > parsed.maxHours) {
    throw new ConfigurationError(
      `minHours (${parsed.minHours}) cannot exceed maxHours (${parsed.maxHours})`,
      "minHours",
    );
  }
  if (parsed.maxHours > parsed.escalatedMaxHours) {
    throw new ConfigurationError(
      `escalatedMaxHours (${parsed.escalatedMaxHours}) cannot be below maxHours (${parsed.maxHours})`,
      "escalatedMaxHours",
    );
  }
  if (parsed.oversightHours > parsed.maxHours || parsed.oversightHours < parsed.minHours) {
    throw new ConfigurationError(
      `oversightHours (${parsed.oversightHours}) must lie between minHours and maxHours`,
      "oversightHours",
    );
  }

  return parsed;
}

// ============================================================================
// Roster helpers
// ============================================================================

export function isSupplementalProvider(catalog: ResolvedCatalog, provider: string): boolean {
  return catalog.supplementalProviders.includes(provider);
}

export function isOversightProvider(catalog: ResolvedCatalog, provider: string): boolean {
  return catalog.oversightProviders.includes(provider);
}

export function isSecondaryProvider(catalog: ResolvedCatalog, provider: string): boolean {
  return catalog.secondaryProviders.includes(provider);
}

export function isSecondaryEligible(catalog: ResolvedCatalog, individual: string): boolean {
  return catalog.secondaryEligibleIndividuals.includes(individual);
}

// ============================================================================
// Internal
// ============================================================================

function parseOrThrow<T extends z.ZodType>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const field = result.error.issues[0]?.path.map(String).join(".");
    throw new ConfigurationError(`${label}:\n${z.prettifyError(result.error)}`, field || undefined);
  }
  return result.data;
}

function assertUnique(names: readonly string[], field: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigurationError(`Provider "${name}" is listed more than once in ${field}`, field);
    }
    seen.add(name);
  }
}

function dedupe(names: readonly string[]): string[] {
  return [...new Set(names)];
}
