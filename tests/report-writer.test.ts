import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { FileReportWriter, formatCatalogErrorLine, formatOutcomeLine } from "../src/storage/report-writer";
import { CatalogError } from "../src/types/errors";
import type { OpOutcome } from "../src/types/sync-types";
import { localAsset, remoteAsset } from "./helpers/fixtures";

const context = { runId: "run-1", dryRun: false, timestamp: "2024-06-01T00:00:00.000Z" };
const asset = localAsset({ relativePath: "2024/IMG_0001.JPG" });

describe("report lines", () => {
  it("writes one tab-separated line per outcome", () => {
    const outcome: OpOutcome = {
      op: { type: "upload", groupKey: asset.baseKey, asset },
      identity: "id",
      status: "done",
      simulated: false,
      alreadyDone: false,
      remoteId: "new-1",
    };

    expect(formatOutcomeLine(context, outcome)).toBe(
      "2024-06-01T00:00:00.000Z\trun-1\tlive\t2024/IMG_0001.JPG\tupload\tdone\tnew-1"
    );
  });

  it("labels ledger skips and stacks", () => {
    const stack: OpOutcome = {
      op: { type: "stack", groupKey: "image:2024/img_0001", primary: asset, members: [asset] },
      identity: "stack:image:2024/img_0001",
      status: "skipped",
      simulated: true,
      alreadyDone: true,
      detail: "already-done",
    };

    expect(formatOutcomeLine({ ...context, dryRun: true }, stack)).toBe(
      "2024-06-01T00:00:00.000Z\trun-1\tdry-run\timage:2024/img_0001\tstack\tskipped(already-done)\talready-done"
    );
  });

  it("flattens tabs and newlines in details", () => {
    const outcome: OpOutcome = {
      op: { type: "skip", groupKey: asset.baseKey, asset, remote: remoteAsset({ id: "r1" }), reason: "already-uploaded" },
      identity: "id",
      status: "failed",
      simulated: false,
      alreadyDone: false,
      detail: "line one\n\tline two",
    };

    expect(formatOutcomeLine(context, outcome).split("\t").pop()).toBe("line one line two");
  });

  it("formats catalog errors", () => {
    expect(formatCatalogErrorLine(context, new CatalogError("Missing XMP sidecar", "IMG_0003.JPG"))).toBe(
      "2024-06-01T00:00:00.000Z\trun-1\tlive\tIMG_0003.JPG\tcatalog-error\tfailed\tMissing XMP sidecar"
    );
  });
});

describe("FileReportWriter", () => {
  it("appends without truncating", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "reexport-report-"));
    try {
      const file = path.join(dir, "reports", "report.tsv");
      const writer = new FileReportWriter(file);

      await writer.append(["a\tb"]);
      await writer.append([]);
      await writer.append(["c\td", "e\tf"]);

      expect(await readFile(file, "utf8")).toBe("a\tb\nc\td\ne\tf\n");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
