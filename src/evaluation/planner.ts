/**
 * Dependency Planner
 *
 * Levels a set of specialists into execution waves: wave 0 holds every
 * specialist with no dependency inside the set, wave k those whose
 * dependencies all sit in waves 0..k-1. Within a wave, catalog
 * declaration order is kept.
 */

import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { CatalogConfigurationError } from "./errors.js";
import type { SpecialistRegistry } from "./registry/index.js";
import type { Specialist } from "./types.js";

export interface DanglingDependency {
  specialistId: string;
  dependency: string;
}

export interface ExecutionPlan {
  waves: ReadonlyArray<readonly Specialist[]>;
  /** Resolved dependencies restricted to the planned set */
  dependenciesOf: ReadonlyMap<string, readonly Specialist[]>;
  dangling: readonly DanglingDependency[];
}

type DependencyResolver = Pick<SpecialistRegistry, "byDependencyName">;

/**
 * Plan waves for `specialists`.
 *
 * A declared dependency with no match inside the set is dangling: it is
 * reported (and emitted as a warning) and otherwise ignored.
 *
 * @throws CatalogConfigurationError("dependency_cycle") on a cycle
 */
export function planWaves(specialists: readonly Specialist[], registry: DependencyResolver): ExecutionPlan {
  const members = new Map(specialists.map((specialist) => [specialist.id, specialist]));
  const ordered = [...members.values()].sort((a, b) => a.order - b.order);
  const dependenciesOf = new Map<string, readonly Specialist[]>();
  const dangling: DanglingDependency[] = [];

  for (const specialist of ordered) {
    const targets = new Map<string, Specialist>();
    for (const dependency of specialist.dependencies) {
      const matches = registry
        .byDependencyName(dependency)
        .filter((match) => match.id !== specialist.id && members.has(match.id));
      if (matches.length === 0) {
        dangling.push({ specialistId: specialist.id, dependency });
        continue;
      }
      for (const match of matches) {
        targets.set(match.id, match);
      }
    }
    dependenciesOf.set(
      specialist.id,
      [...targets.values()].sort((a, b) => a.order - b.order)
    );
  }

  for (const entry of dangling) {
    emit(TelemetryEvents.DanglingDependency, {
      specialist_id: entry.specialistId,
      dependency: entry.dependency,
    });
  }

  const waves: Specialist[][] = [];
  const placed = new Set<string>();
  let remaining = ordered;

  while (remaining.length > 0) {
    const wave = remaining.filter((specialist) =>
      (dependenciesOf.get(specialist.id) ?? []).every((dependency) => placed.has(dependency.id))
    );

    if (wave.length === 0) {
      const cycle = findCycle(remaining, dependenciesOf);
      throw new CatalogConfigurationError(
        "dependency_cycle",
        `Dependency cycle detected: ${cycle.join(" -> ")}`,
        { cycle }
      );
    }

    for (const specialist of wave) {
      placed.add(specialist.id);
    }
    waves.push(wave);
    remaining = remaining.filter((specialist) => !placed.has(specialist.id));
  }

  return { waves, dependenciesOf, dangling };
}

/**
 * Walk unplaced specialists until one repeats; every unplaced specialist
 * has at least one unplaced dependency, so a repeat is guaranteed.
 */
function findCycle(
  remaining: readonly Specialist[],
  dependenciesOf: ReadonlyMap<string, readonly Specialist[]>
): string[] {
  const unplaced = new Set(remaining.map((specialist) => specialist.id));
  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = remaining[0]?.id;

  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    current = (dependenciesOf.get(current) ?? []).find((dependency) => unplaced.has(dependency.id))?.id;
  }

  if (current === undefined) {
    return path;
  }
  // Report in execution direction: a -> b means a must run before b
  return [...path.slice(position.get(current) ?? 0), current].reverse();
}
