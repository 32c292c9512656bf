import { engineeringDepartment } from "./engineering.js";
import { financeDepartment } from "./finance.js";
import { hrDepartment } from "./hr.js";
import { salesDepartment } from "./sales.js";
import { supportDepartment } from "./support.js";
import type { DepartmentName, DepartmentProfile } from "./types.js";

export const DEFAULT_DEPARTMENTS: readonly DepartmentProfile[] = Object.freeze([
  hrDepartment,
  engineeringDepartment,
  salesDepartment,
  financeDepartment,
  supportDepartment
]);

/**
 * Immutable, ordered set of departments the router may choose from. The order of
 * `profiles` is the canonical order used for routing decisions, fan-out and merge input.
 */
export class DepartmentCatalog {
  readonly profiles: readonly DepartmentProfile[];
  private readonly byLabel: ReadonlyMap<string, DepartmentProfile>;

  constructor(profiles: readonly DepartmentProfile[]) {
    if (!profiles.length) {
      throw new Error("A department catalog needs at least one department.");
    }
    const labels = new Map<string, DepartmentProfile>();
    const seen = new Set<DepartmentName>();
    for (const profile of profiles) {
      if (seen.has(profile.name)) {
        throw new Error(`Department ${profile.name} is listed twice.`);
      }
      seen.add(profile.name);
      for (const label of [profile.name, ...profile.aliases]) {
        labels.set(normalizeLabel(label), profile);
      }
    }
    this.profiles = Object.freeze([...profiles]);
    this.byLabel = labels;
  }

  /** Builds a catalog from the default profiles, optionally reordered or narrowed. */
  static fromOrder(order?: readonly DepartmentName[]): DepartmentCatalog {
    if (!order?.length) {
      return new DepartmentCatalog(DEFAULT_DEPARTMENTS);
    }
    return new DepartmentCatalog(
      order.map((name) => {
        const profile = DEFAULT_DEPARTMENTS.find((candidate) => candidate.name === name);
        if (!profile) {
          throw new Error(`Unknown department ${name}.`);
        }
        return profile;
      })
    );
  }

  get names(): DepartmentName[] {
    return this.profiles.map((profile) => profile.name);
  }

  get(name: DepartmentName): DepartmentProfile | undefined {
    return this.profiles.find((profile) => profile.name === name);
  }

  require(name: DepartmentName): DepartmentProfile {
    const profile = this.get(name);
    if (!profile) {
      throw new Error(`Department ${name} is not part of this catalog.`);
    }
    return profile;
  }

  /** Case-insensitive lookup by department name or alias. */
  resolve(label: string): DepartmentProfile | undefined {
    return this.byLabel.get(normalizeLabel(label));
  }

  /** Deduplicates and sorts into catalog order; names outside the catalog are dropped. */
  canonicalize(names: Iterable<DepartmentName>): DepartmentName[] {
    const wanted = new Set(names);
    return this.names.filter((name) => wanted.has(name));
  }

  clarificationPrompt(): string {
    const names = this.names;
    const listed =
      names.length > 1
        ? `${names.slice(0, -1).join(", ")}${names.length > 2 ? "," : ""} or ${names[names.length - 1]}`
        : names[0];
    return `Could you clarify whether this relates to ${listed}?`;
  }
}

function normalizeLabel(label: string): string {
  return label
    .trim()
    .toLowerCase()
    .replace(/\s+department$/, "")
    .replace(/\s+/g, " ");
}
