import type { Provenance } from "../types/sync-types";

export type ProvenanceSignals = {
  deviceId?: string;
  deviceAssetId?: string;
  make?: string | null;
  model?: string | null;
};

type ProvenanceRule = {
  provenance: Provenance;
  test: (signals: Required<Pick<ProvenanceSignals, "deviceId" | "deviceAssetId">> & { device: string }) => boolean;
};

const IOS_LOCAL_IDENTIFIER = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\/L0\/\d{3}$/i;
const ANDROID_MEDIA_ID = /^\d+$/;
const DESKTOP_CLIENTS = /^(cli|web)$|immich-go|desktop|reexport/i;
const MOBILE_DEVICES = /iphone|ipad|android|pixel|\bsm-[a-z0-9]+/i;

/**
 * Classifies where a remote asset came from. Rules are ordered; the first match wins.
 * Our own uploads are recognised by the configured device id.
 */
export class ProvenanceClassifier {
  private rules: ProvenanceRule[];

  constructor(uploadDeviceId: string) {
    this.rules = [
      {
        provenance: "desktop",
        test: ({ deviceId }) => deviceId !== "" && deviceId === uploadDeviceId,
      },
      {
        provenance: "desktop",
        test: ({ deviceId }) => DESKTOP_CLIENTS.test(deviceId),
      },
      {
        provenance: "mobile",
        test: ({ deviceAssetId }) => IOS_LOCAL_IDENTIFIER.test(deviceAssetId),
      },
      {
        provenance: "mobile",
        test: ({ deviceAssetId }) => ANDROID_MEDIA_ID.test(deviceAssetId),
      },
      {
        provenance: "mobile",
        test: ({ device }) => MOBILE_DEVICES.test(device),
      },
    ];
  }

  classify(signals: ProvenanceSignals): Provenance {
    const deviceId = signals.deviceId?.trim() ?? "";
    const deviceAssetId = signals.deviceAssetId?.trim() ?? "";
    const device = [deviceId, signals.make ?? "", signals.model ?? ""].join(" ");
    for (const rule of this.rules) {
      if (rule.test({ deviceId, deviceAssetId, device })) {
        return rule.provenance;
      }
    }
    return "unknown";
  }
}
