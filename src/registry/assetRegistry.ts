import { canonicalDigest, type Sha256Digest } from "../core/canonicalJson.js";

/** genome → asset category → seek key → value */
export type AssetMap = Readonly<Record<string, Readonly<Record<string, Readonly<Record<string, string>>>>>>;

export interface AssetRegistry {
  /** Content digest; two registries with equal contents share it. */
  readonly digest: Sha256Digest;
  /** Nested lookup. Any missing level yields null, never an exception. */
  seek(genome: string, asset: string, seekKey: string): string | null;
  hasGenome(genome: string): boolean;
}

function ownValue<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  if (!record || !Object.prototype.hasOwnProperty.call(record, key)) return undefined;
  return record[key];
}

export class InMemoryAssetRegistry implements AssetRegistry {
  readonly digest: Sha256Digest;
  private readonly assets: AssetMap;

  constructor(assets: AssetMap) {
    const copy: Record<string, Record<string, Record<string, string>>> = {};
    for (const [genome, byAsset] of Object.entries(assets)) {
      const genomeCopy: Record<string, Record<string, string>> = {};
      for (const [asset, seekKeys] of Object.entries(byAsset)) {
        genomeCopy[asset] = { ...seekKeys };
      }
      copy[genome] = genomeCopy;
    }
    this.assets = copy;
    this.digest = canonicalDigest(copy);
  }

  static empty(): InMemoryAssetRegistry {
    return new InMemoryAssetRegistry({});
  }

  seek(genome: string, asset: string, seekKey: string): string | null {
    const value = ownValue(ownValue(ownValue(this.assets, genome), asset), seekKey);
    return typeof value === "string" ? value : null;
  }

  hasGenome(genome: string): boolean {
    return ownValue(this.assets, genome) !== undefined;
  }

  genomes(): string[] {
    return Object.keys(this.assets).sort();
  }
}
