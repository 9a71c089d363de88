/**
 * Specialist Registry
 *
 * Immutable catalog of evaluation specialists, built once at startup.
 * Dependency names are resolved here, into an explicit name → specialist-set
 * index, so nothing downstream re-scans the catalog per lookup.
 *
 * A dependency name matches, in order of preference:
 * 1. every specialist whose sub-parameter has that name
 * 2. every specialist in the parameter with that name
 *
 * A name matching neither is a fatal configuration error.
 */

import { readBundledJson, readJsonFile } from "../../utils/data-file.js";
import { log } from "../../utils/telemetry.js";
import { CatalogConfigurationError } from "../errors.js";
import { normalizeName } from "../text.js";
import type { ClusterDefinition, FrameworkInfo, Specialist } from "../types.js";
import { SpecialistCatalog } from "./catalog-schema.js";

export const BUNDLED_CATALOG = "evaluation/registry/catalog.json";

function defaultRole(subParameter: string): string {
  return `Specialized validation expert for ${subParameter} assessment`;
}

export class SpecialistRegistry {
  private readonly byId: ReadonlyMap<string, Specialist>;
  private readonly bySubParameter: ReadonlyMap<string, readonly Specialist[]>;
  private readonly byParameter: ReadonlyMap<string, readonly Specialist[]>;
  private readonly resolved: ReadonlyMap<string, readonly Specialist[]>;
  private readonly clusterByName: ReadonlyMap<string, ClusterDefinition>;

  private constructor(
    readonly version: string,
    private readonly specialists: readonly Specialist[],
    private readonly clusterList: readonly ClusterDefinition[]
  ) {
    const byId = new Map<string, Specialist>();
    const bySub = new Map<string, Specialist[]>();
    const byParam = new Map<string, Specialist[]>();
    const seenPaths = new Set<string>();

    for (const specialist of specialists) {
      if (byId.has(specialist.id)) {
        throw new CatalogConfigurationError("duplicate_specialist", `Duplicate specialist id "${specialist.id}"`, {
          specialist_id: specialist.id,
        });
      }
      const path = `${specialist.cluster}/${specialist.parameter}/${specialist.subParameter}`;
      if (seenPaths.has(path)) {
        throw new CatalogConfigurationError("duplicate_specialist", `Duplicate sub-parameter "${path}"`, {
          path,
        });
      }
      seenPaths.add(path);
      byId.set(specialist.id, specialist);

      const subKey = normalizeName(specialist.subParameter);
      bySub.set(subKey, [...(bySub.get(subKey) ?? []), specialist]);
      const paramKey = normalizeName(specialist.parameter);
      byParam.set(paramKey, [...(byParam.get(paramKey) ?? []), specialist]);
    }

    this.byId = byId;
    this.bySubParameter = bySub;
    this.byParameter = byParam;
    this.clusterByName = new Map(clusterList.map((cluster) => [cluster.name, cluster]));

    const resolved = new Map<string, readonly Specialist[]>();
    for (const specialist of specialists) {
      const targets = new Map<string, Specialist>();
      for (const dependency of specialist.dependencies) {
        const matches = this.byDependencyName(dependency);
        if (matches.length === 0) {
          throw new CatalogConfigurationError(
            "unknown_dependency",
            `Specialist "${specialist.id}" depends on "${dependency}", which matches no sub-parameter or parameter`,
            { specialist_id: specialist.id, dependency }
          );
        }
        for (const match of matches) {
          if (match.id !== specialist.id) {
            targets.set(match.id, match);
          }
        }
      }
      resolved.set(
        specialist.id,
        [...targets.values()].sort((a, b) => a.order - b.order)
      );
    }
    this.resolved = resolved;
  }

  /**
   * Build a registry from raw catalog data.
   *
   * @throws CatalogConfigurationError when the catalog is malformed or a
   *         dependency cannot be satisfied
   */
  static fromCatalog(input: unknown): SpecialistRegistry {
    const parsed = SpecialistCatalog.safeParse(input);
    if (!parsed.success) {
      throw new CatalogConfigurationError("invalid_catalog", "Specialist catalog failed schema validation", {
        validation_errors: parsed.error.flatten(),
      });
    }

    const specialists: Specialist[] = [];
    const clusters: ClusterDefinition[] = [];

    for (const cluster of parsed.data.clusters) {
      const specialistIds: string[] = [];
      for (const parameter of cluster.parameters) {
        for (const entry of parameter.specialists) {
          specialists.push(
            Object.freeze({
              id: entry.id,
              cluster: cluster.name,
              parameter: parameter.name,
              subParameter: entry.subParameter,
              weight: entry.weight,
              dependencies: Object.freeze([...entry.dependencies]),
              role: entry.role ?? defaultRole(entry.subParameter),
              order: specialists.length,
            })
          );
          specialistIds.push(entry.id);
        }
      }
      clusters.push(
        Object.freeze({
          name: cluster.name,
          displayName: cluster.displayName ?? cluster.name,
          weight: cluster.weight,
          persona: cluster.persona,
          parameters: Object.freeze(cluster.parameters.map((parameter) => parameter.name)),
          specialistIds: Object.freeze(specialistIds),
        })
      );
    }

    const registry = new SpecialistRegistry(parsed.data.version, Object.freeze(specialists), Object.freeze(clusters));
    log.info(
      { catalog_version: registry.version, specialists: registry.size, clusters: clusters.length },
      "Specialist registry built"
    );
    return registry;
  }

  /**
   * Load a catalog file, or the bundled catalog when no path is given.
   */
  static load(path?: string): SpecialistRegistry {
    return SpecialistRegistry.fromCatalog(path ? readJsonFile(path) : readBundledJson(BUNDLED_CATALOG));
  }

  get size(): number {
    return this.specialists.length;
  }

  /** Every specialist, in catalog declaration order */
  allSpecialists(): readonly Specialist[] {
    return this.specialists;
  }

  byDependencyName(name: string): readonly Specialist[] {
    const key = normalizeName(name);
    return this.bySubParameter.get(key) ?? this.byParameter.get(key) ?? [];
  }

  /** Specialists a given specialist depends on, excluding itself, in declaration order */
  resolveDependencies(specialist: Specialist): readonly Specialist[] {
    return this.resolved.get(specialist.id) ?? [];
  }

  get(id: string): Specialist | undefined {
    return this.byId.get(id);
  }

  clusters(): readonly ClusterDefinition[] {
    return this.clusterList;
  }

  cluster(name: string): ClusterDefinition | undefined {
    return this.clusterByName.get(name);
  }

  frameworkInfo(): Omit<FrameworkInfo, "waveCount"> {
    return {
      catalogVersion: this.version,
      totalSpecialists: this.size,
      clusters: this.clusterList.map((cluster) => ({
        name: cluster.name,
        displayName: cluster.displayName,
        weight: cluster.weight,
        specialists: cluster.specialistIds.length,
      })),
      dependentSpecialists: this.specialists.filter((specialist) => specialist.dependencies.length > 0).length,
    };
  }
}
