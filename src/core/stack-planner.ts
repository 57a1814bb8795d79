import type { AssetMatch, StackGroup, VariantKind } from "../types/sync-types";
import type { StackPlanner } from "../types/interfaces";

const VARIANT_ORDER: Record<VariantKind, number> = {
  original: 0,
  edited: 1,
  derivative: 2,
};

const PRIMARY_PREFERENCE: VariantKind[] = ["edited", "original", "derivative"];

export class DefaultStackPlanner implements StackPlanner {
  group(matches: AssetMatch[]): StackGroup[] {
    const byKey = new Map<string, AssetMatch[]>();
    for (const match of matches) {
      const members = byKey.get(match.local.baseKey) ?? [];
      members.push(match);
      byKey.set(match.local.baseKey, members);
    }

    return [...byKey.keys()]
      .sort((a, b) => a.localeCompare(b))
      .map((key) => this.buildGroup(key, byKey.get(key) ?? []));
  }

  private buildGroup(key: string, members: AssetMatch[]): StackGroup {
    const sorted = [...members].sort(
      (a, b) =>
        VARIANT_ORDER[a.local.variant] - VARIANT_ORDER[b.local.variant] ||
        a.local.relativePath.localeCompare(b.local.relativePath)
    );

    let primary = sorted[0];
    for (const variant of PRIMARY_PREFERENCE) {
      const found = sorted.find((member) => member.local.variant === variant);
      if (found) {
        primary = found;
        break;
      }
    }

    return {
      key,
      primary,
      members: [primary, ...sorted.filter((member) => member !== primary)],
    };
  }
}
