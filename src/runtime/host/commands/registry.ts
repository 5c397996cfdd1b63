import type { ContainerEntry } from "../../../config";

export const AUTO_ADDRESS = "auto";
export const UNAVAILABLE_ADDRESS = "unavailable";
const NOT_APPLICABLE = "N/A";

export interface ContainerSpec {
  readonly shortName: string;
  // Container name or id on the runtime.
  readonly container: string;
  readonly displayAddress: string;
  readonly displayPort: string;
  readonly displayCredential: string;
}

export interface RegistryBuildOptions {
  // Substituted for entries whose address is "auto" or omitted.
  publicAddress?: string;
}

export function needsPublicAddress(entries: readonly ContainerEntry[]): boolean {
  return entries.some((entry) => !entry.address || entry.address === AUTO_ADDRESS);
}

/**
 * Read-only table of the containers the bot may touch, in declaration order.
 * Lookups ignore case.
 */
export class ContainerRegistry {
  private readonly entries: readonly ContainerSpec[];
  private readonly byKey: ReadonlyMap<string, ContainerSpec>;

  constructor(specs: readonly ContainerSpec[]) {
    const byKey = new Map<string, ContainerSpec>();
    for (const spec of specs) {
      const key = spec.shortName.toLowerCase();
      if (byKey.has(key)) {
        throw new Error(`Duplicate container name in registry: ${spec.shortName}`);
      }
      byKey.set(key, Object.freeze({ ...spec }));
    }
    this.byKey = byKey;
    this.entries = Object.freeze(Array.from(byKey.values()));
  }

  static fromConfig(
    entries: readonly ContainerEntry[],
    options: RegistryBuildOptions = {},
  ): ContainerRegistry {
    return new ContainerRegistry(
      entries.map((entry) => {
        const address =
          !entry.address || entry.address === AUTO_ADDRESS
            ? (options.publicAddress ?? UNAVAILABLE_ADDRESS)
            : entry.address;
        return {
          shortName: entry.name,
          container: entry.container ?? entry.name,
          displayAddress: address,
          displayPort: entry.port ?? NOT_APPLICABLE,
          displayCredential: entry.password ? entry.password : NOT_APPLICABLE,
        };
      }),
    );
  }

  resolve(shortName: string): ContainerSpec | undefined {
    return this.byKey.get(shortName.trim().toLowerCase());
  }

  list(): readonly ContainerSpec[] {
    return this.entries;
  }

  names(): string[] {
    return this.entries.map((entry) => entry.shortName);
  }

  get size(): number {
    return this.entries.length;
  }
}
