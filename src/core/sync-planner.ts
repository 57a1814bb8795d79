import type {
  AssetMatch,
  LocalAsset,
  RemoteAsset,
  RemoteIndex,
  RunRecord,
  StackGroup,
  SyncOp,
  SyncPlan,
} from "../types/sync-types";
import type { SyncPlanner } from "../types/interfaces";

const MASS_MISSING_THRESHOLD = 10;

export const assetIdentity = (asset: LocalAsset): string => `${asset.checksum}:${asset.relativePath}`;

export const stackIdentity = (groupKey: string): string => `stack:${groupKey}`;

export const opIdentity = (op: SyncOp): string =>
  op.type === "stack" ? stackIdentity(op.groupKey) : assetIdentity(op.asset);

/** The service already holds these bytes under the target, so the target keeps its id. */
export const isInPlaceReplace = (op: SyncOp): boolean =>
  op.type === "replace" && op.reuseRemoteId === undefined && op.asset.checksum === op.target.checksum;

export class DefaultSyncPlanner implements SyncPlanner {
  plan(groups: StackGroup[], remote: RemoteIndex, records: Record<string, RunRecord>): SyncPlan {
    const ops: SyncOp[] = [];

    // Empty remote after earlier completed runs: nothing is uploaded.
    const doneCount = Object.values(records).filter((record) => record.status === "done").length;
    if (Object.keys(remote.assets).length === 0 && doneCount > MASS_MISSING_THRESHOLD) {
      const warning =
        `Remote library appears to be empty, but ${doneCount} assets were reconciled before. ` +
        `Routing every asset to manual review instead of uploading.`;
      for (const group of groups) {
        for (const member of group.members) {
          ops.push({
            type: "review",
            groupKey: group.key,
            asset: member.local,
            reason: "remote-index-empty-safety",
            candidateIds: [],
            message: "remote library is empty although earlier runs completed",
          });
        }
      }
      return { ops, warnings: [warning] };
    }

    for (const group of groups) {
      const memberOps = group.members.map((member) => this.planMember(group.key, member, remote, records));
      ops.push(...memberOps);

      const stackOp = this.planStack(group, memberOps);
      if (stackOp) {
        ops.push(stackOp);
      }
    }

    return { ops, warnings: [] };
  }

  private planMember(
    groupKey: string,
    match: AssetMatch,
    remote: RemoteIndex,
    records: Record<string, RunRecord>
  ): SyncOp {
    const asset = match.local;

    if (match.ambiguity) {
      return {
        type: "review",
        groupKey,
        asset,
        reason: "ambiguous-match",
        candidateIds: match.ambiguity.candidateIds,
        message: match.ambiguity.message,
      };
    }

    if (!match.remote) {
      return { type: "upload", groupKey, asset };
    }

    if (match.reason === "name-and-time-proximity") {
      return this.replaceOp(groupKey, asset, match.remote, "name-and-time-proximity");
    }

    // An earlier run uploaded this file but could not finish carrying metadata or removing the old asset.
    const record = records[assetIdentity(asset)];
    if (
      record?.status === "failed" &&
      record.op === "replace" &&
      record.remoteId === match.remote.id &&
      record.replacedRemoteId
    ) {
      const previous = remote.assets[record.replacedRemoteId];
      if (previous && previous.id !== match.remote.id) {
        return {
          ...this.replaceOp(groupKey, asset, previous, "exact-checksum"),
          reuseRemoteId: record.remoteId,
        };
      }
    }

    // Assets uploaded from a phone give way to the export's copy.
    if (match.remote.provenance === "mobile") {
      return this.replaceOp(groupKey, asset, match.remote, "exact-checksum");
    }

    return { type: "skip", groupKey, asset, remote: match.remote, reason: "already-uploaded" };
  }

  private replaceOp(
    groupKey: string,
    asset: LocalAsset,
    target: RemoteAsset,
    reason: "exact-checksum" | "name-and-time-proximity"
  ): Extract<SyncOp, { type: "replace" }> {
    return {
      type: "replace",
      groupKey,
      asset,
      target,
      reason,
      snapshot: { albumIds: [...target.albumIds], isFavorite: target.isFavorite },
    };
  }

  private planStack(group: StackGroup, memberOps: SyncOp[]): SyncOp | null {
    if (group.members.length < 2) {
      return null;
    }

    const eligible = memberOps.filter(
      (op): op is Exclude<SyncOp, { type: "review" } | { type: "stack" }> =>
        op.type !== "review" && op.type !== "stack"
    );
    if (eligible.length < 2) {
      return null;
    }

    const primary = eligible[0];
    // Members that keep their current remote id count toward an existing stack.
    const existing = eligible.map((op) => {
      if (op.type === "skip") {
        return op.remote;
      }
      return op.type === "replace" && isInPlaceReplace(op) ? op.target : null;
    });
    const stackId = existing[0]?.stack?.id;
    const alreadyStacked =
      stackId !== undefined &&
      existing.every((asset) => asset !== null && asset.stack?.id === stackId) &&
      existing[0]?.stack?.primaryAssetId === existing[0]?.id;

    if (alreadyStacked) {
      return null;
    }

    return {
      type: "stack",
      groupKey: group.key,
      primary: primary.asset,
      members: eligible.map((op) => op.asset),
    };
  }
}
