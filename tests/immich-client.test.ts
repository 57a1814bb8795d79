import { afterEach, describe, expect, it, vi } from "vitest";
import { ImmichApiClient } from "../src/clients/immich-client";
import { PermanentRemoteError, RemoteOperationFailed, TransientRemoteError } from "../src/types/errors";
import { ExportTree } from "./helpers/fixtures";

const json = (body: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json", ...headers } });

const createClient = () =>
  new ImmichApiClient("https://photos.example.test/api/", "test-secret", {
    deviceId: "reexport-sync",
    requestTimeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => undefined },
  });

const mockFetch = () => {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

const requestOf = (fetchMock: ReturnType<typeof mockFetch>, call = 0): { url: string; init: RequestInit } => {
  const [url, init] = fetchMock.mock.calls[call];
  return { url: String(url), init: init ?? {} };
};

describe("ImmichApiClient", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  // Never answers; rejects once the request is aborted.
  const hangUntilAborted = (fetchMock: ReturnType<typeof mockFetch>, signals: AbortSignal[] = []) =>
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signals.push(signal);
            signal.addEventListener("abort", () => reject(new Error("This operation was aborted")));
          }
        })
    );

  it("sends the API key and normalizes the server URL", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValueOnce(json({ res: "pong" }));

    await createClient().ping();

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe("https://photos.example.test/api/server/ping");
    expect(init.headers).toMatchObject({ "x-api-key": "test-secret" });
  });

  it("pages through metadata search", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValueOnce(
      json({
        assets: {
          items: [
            {
              id: "a1",
              checksum: "c1",
              originalFileName: "IMG_0001.JPG",
              fileCreatedAt: "2024-05-01T08:00:00.000Z",
              localDateTime: "2024-05-01T10:00:00.000Z",
              type: "IMAGE",
              exifInfo: { make: "Apple", model: null, fileSizeInByte: 1000 },
              stack: null,
            },
          ],
          nextPage: "2",
        },
      })
    );

    const result = await createClient().searchAssets(1, 500);

    expect(result.nextPage).toBe(2);
    expect(result.items.map((item) => item.id)).toEqual(["a1"]);
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe("https://photos.example.test/api/search/metadata");
    expect(JSON.parse(String(init.body))).toEqual({ page: 1, size: 500, withExif: true, withStacked: true });
  });

  it("retries server errors and then succeeds", async () => {
    const fetchMock = mockFetch();
    fetchMock
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(json([{ id: "alb-1", albumName: "Trip" }]));

    const albums = await createClient().listAlbums();

    expect(albums).toEqual([{ id: "alb-1", albumName: "Trip" }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("turns exhausted network failures into RemoteOperationFailed", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    const failure = createClient().listAlbums();

    await expect(failure).rejects.toBeInstanceOf(RemoteOperationFailed);
    await expect(failure).rejects.toThrow(
      "listAlbums failed after 3 attempt(s): Immich API unreachable (listAlbums): fetch failed"
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("treats a request that outlives its timeout as transient", async () => {
    const fetchMock = mockFetch();
    hangUntilAborted(fetchMock);
    const client = new ImmichApiClient("https://photos.example.test", "test-secret", {
      deviceId: "reexport-sync",
      requestTimeoutMs: 5,
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => undefined },
    });

    const failure = client.listAlbums();

    await expect(failure).rejects.toThrow(
      "listAlbums failed after 2 attempt(s): Immich API timeout after 5ms (listAlbums)"
    );
    const error = await failure.catch((reason: unknown) => reason);
    expect(error instanceof RemoteOperationFailed && error.cause).toBeInstanceOf(TransientRemoteError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives large uploads a second per MiB before timing out", async () => {
    const tree = await ExportTree.create();
    try {
      const file = await tree.addAsset("MOV_0001.MOV", "video bytes");
      const fetchMock = mockFetch();
      const signals: AbortSignal[] = [];
      hangUntilAborted(fetchMock, signals);
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
      const client = new ImmichApiClient("https://photos.example.test", "test-secret", {
        deviceId: "reexport-sync",
        requestTimeoutMs: 1000,
        uploadTimeoutMs: 2000,
        retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => undefined },
      });

      const upload = client.uploadAsset({
        path: file,
        fileName: "MOV_0001.MOV",
        size: 3 * 1024 * 1024,
        deviceAssetId: "MOV_0001.MOV-3145728",
        fileCreatedAt: "2024-05-01T08:00:00.000Z",
        fileModifiedAt: "2024-05-01T08:00:00.000Z",
      });
      const outcome = expect(upload).rejects.toThrow(
        "upload MOV_0001.MOV failed after 1 attempt(s): Immich API timeout after 3000ms (upload MOV_0001.MOV)"
      );
      while (signals.length === 0) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      vi.advanceTimersByTime(2999);
      expect(signals[0].aborted).toBe(false);
      vi.advanceTimersByTime(1);
      expect(signals[0].aborted).toBe(true);
      await outcome;
    } finally {
      await tree.cleanup();
    }
  });

  it("does not retry client errors", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValue(new Response("Asset not found", { status: 400 }));

    const failure = createClient().updateAsset("a1", { isFavorite: true });

    await expect(failure).rejects.toBeInstanceOf(PermanentRemoteError);
    await expect(failure).rejects.toThrow("Immich API error 400 (updateAsset a1): Asset not found");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("treats duplicate album members as success", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValueOnce(
      json([
        { id: "a1", success: true },
        { id: "a2", success: false, error: "duplicate" },
      ])
    );

    await createClient().addAssetsToAlbum("alb-1", ["a1", "a2"]);

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe("https://photos.example.test/api/albums/alb-1/assets");
    expect(init.method).toBe("PUT");
  });

  it("rejects album additions the server refused", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValueOnce(json([{ id: "a1", success: false, error: "no_permission" }]));

    await expect(createClient().addAssetsToAlbum("alb-1", ["a1"])).rejects.toThrow(
      "Album alb-1 rejected assets (a1: no_permission)"
    );
  });

  it("uploads the file with its sidecar and reports duplicates", async () => {
    const tree = await ExportTree.create();
    try {
      const file = await tree.addAsset("IMG_0001.JPG", "bytes");
      const fetchMock = mockFetch();
      fetchMock.mockResolvedValueOnce(json({ id: "a9", status: "duplicate" }, 200));

      const result = await createClient().uploadAsset({
        path: file,
        sidecarPath: `${file}.xmp`,
        fileName: "IMG_0001.JPG",
        size: 5,
        deviceAssetId: "IMG_0001.JPG-5",
        fileCreatedAt: "2024-05-01T08:00:00.000Z",
        fileModifiedAt: "2024-05-01T08:00:00.000Z",
      });

      expect(result).toEqual({ id: "a9", duplicate: true });
      const { init } = requestOf(fetchMock);
      expect(init.body).toBeInstanceOf(FormData);
      const form = init.body instanceof FormData ? init.body : new FormData();
      expect(form.get("deviceId")).toBe("reexport-sync");
      expect(form.get("deviceAssetId")).toBe("IMG_0001.JPG-5");
      expect(form.has("assetData")).toBe(true);
      expect(form.has("sidecarData")).toBe(true);
    } finally {
      await tree.cleanup();
    }
  });

  it("creates stacks with the primary first", async () => {
    const fetchMock = mockFetch();
    fetchMock.mockResolvedValueOnce(json({ id: "stack-1", primaryAssetId: "e1", assets: [] }, 201));

    await expect(createClient().createStack(["e1", "o1"])).resolves.toBe("stack-1");
    expect(JSON.parse(String(requestOf(fetchMock).init.body))).toEqual({ assetIds: ["e1", "o1"] });
  });

  it("skips empty deletes", async () => {
    const fetchMock = mockFetch();

    await createClient().deleteAssets([]);

    expect(fetchMock).not.toHaveBeenCalled();
  });
});
