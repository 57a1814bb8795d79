import type { AssetMatch, LocalAsset, MatchResult, RemoteAsset, RemoteIndex } from "../types/sync-types";
import type { Matcher } from "../types/interfaces";
import { MatchAmbiguityError } from "../types/errors";
import { nameTimeKey, timeBucket } from "../indexers/remote-indexer";

const byId = (a: RemoteAsset, b: RemoteAsset): number => a.id.localeCompare(b.id);

const round = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Pairs local assets with remote ones. Exact checksums are claimed first so that a byte-identical
 * remote asset is never also offered as a name-and-time candidate. Album and favorite state play no part.
 */
export class DefaultMatcher implements Matcher {
  match(assets: LocalAsset[], remote: RemoteIndex): MatchResult {
    const sorted = [...assets].sort((a, b) => a.relativePath.localeCompare(b.relativePath));
    const matches = new Map<string, AssetMatch>();
    // remote id -> local path that claimed it by checksum
    const claimedExact = new Map<string, string>();

    for (const local of sorted) {
      const candidates = [...(remote.byChecksum[local.checksum] ?? [])].sort(byId);
      if (candidates.length === 0) {
        continue;
      }
      const pick = candidates.find((candidate) => !claimedExact.has(candidate.id));
      if (!pick) {
        // Same bytes as a file matched earlier, and no unclaimed remote copy left.
        const owners = candidates.map((candidate) => claimedExact.get(candidate.id) ?? candidate.id);
        matches.set(local.relativePath, {
          local,
          remote: null,
          reason: "none",
          confidence: 0,
          ambiguity: new MatchAmbiguityError(
            `Every remote asset with this checksum already matches another local file (${owners.join(", ")})`,
            local.relativePath,
            candidates.map((candidate) => candidate.id)
          ),
        });
        continue;
      }
      claimedExact.set(pick.id, local.relativePath);
      matches.set(local.relativePath, {
        local,
        remote: pick,
        reason: "exact-checksum",
        confidence: 1,
      });
    }

    const proximityClaims = new Map<string, string[]>();
    for (const local of sorted) {
      if (matches.has(local.relativePath)) {
        continue;
      }

      const match = this.matchByNameAndTime(local, remote, claimedExact);
      matches.set(local.relativePath, match);
      if (match.remote) {
        const claims = proximityClaims.get(match.remote.id) ?? [];
        claims.push(local.relativePath);
        proximityClaims.set(match.remote.id, claims);
      }
    }

    // One remote asset can be replaced by at most one local asset; contested claims go to review.
    for (const [remoteId, paths] of proximityClaims) {
      if (paths.length < 2) {
        continue;
      }
      for (const relativePath of paths) {
        const contested = matches.get(relativePath);
        if (!contested) {
          continue;
        }
        matches.set(relativePath, {
          local: contested.local,
          remote: null,
          reason: "none",
          confidence: 0,
          ambiguity: new MatchAmbiguityError(
            `Remote asset ${remoteId} is the closest match for ${paths.length} local files`,
            relativePath,
            [remoteId]
          ),
        });
      }
    }

    const ordered = sorted.flatMap((local) => {
      const match = matches.get(local.relativePath);
      return match ? [match] : [];
    });
    const used = new Set(ordered.flatMap((match) => (match.remote ? [match.remote.id] : [])));
    const residual = Object.values(remote.assets)
      .filter((asset) => !used.has(asset.id))
      .sort(byId);

    return { matches: ordered, residual };
  }

  private matchByNameAndTime(
    local: LocalAsset,
    remote: RemoteIndex,
    claimedExact: ReadonlyMap<string, string>
  ): AssetMatch {
    const windowMs = remote.timeWindowMs;
    const candidates = this.findCandidates(local, remote, claimedExact);

    if (candidates.length === 0) {
      return { local, remote: null, reason: "none", confidence: 0 };
    }

    const distance = (asset: RemoteAsset): number => Math.abs(asset.wallClock - local.wallClock);
    const closest = Math.min(...candidates.map(distance));
    const tied = candidates.filter((asset) => distance(asset) === closest);

    let pick: RemoteAsset | null = tied.length === 1 ? tied[0] : null;
    if (!pick) {
      const mobile = tied.filter((asset) => asset.provenance === "mobile");
      pick = mobile.length === 1 ? mobile[0] : null;
    }

    if (!pick) {
      return {
        local,
        remote: null,
        reason: "none",
        confidence: 0,
        ambiguity: new MatchAmbiguityError(
          `${tied.length} remote candidates are equally close to ${local.relativePath}`,
          local.relativePath,
          tied.map((asset) => asset.id)
        ),
      };
    }

    const timeScore = 1 - closest / windowMs;
    const sizeScore =
      pick.size !== undefined && pick.size > 0 && local.size > 0
        ? Math.min(pick.size, local.size) / Math.max(pick.size, local.size)
        : 0.5;

    return {
      local,
      remote: pick,
      reason: "name-and-time-proximity",
      confidence: round((timeScore + sizeScore) / 2),
    };
  }

  private findCandidates(
    local: LocalAsset,
    remote: RemoteIndex,
    claimedExact: ReadonlyMap<string, string>
  ): RemoteAsset[] {
    const windowMs = remote.timeWindowMs;
    const bucket = timeBucket(local.wallClock, windowMs);
    const seen = new Set<string>();
    const candidates: RemoteAsset[] = [];

    // Neighbouring buckets catch pairs that straddle a bucket boundary.
    for (const offset of [-1, 0, 1]) {
      for (const asset of remote.byNameAndTime[nameTimeKey(local.stem, bucket + offset)] ?? []) {
        if (seen.has(asset.id) || claimedExact.has(asset.id)) {
          continue;
        }
        seen.add(asset.id);
        if (asset.mediaType !== local.mediaType) {
          continue;
        }
        if (Math.abs(asset.wallClock - local.wallClock) > windowMs) {
          continue;
        }
        candidates.push(asset);
      }
    }

    return candidates.sort(byId);
  }
}
