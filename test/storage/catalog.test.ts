import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ValiError } from "valibot";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { newBlobReference } from "../../src/storage/blobStore.js";
import { FileCatalogStore, type CatalogSnapshot } from "../../src/storage/catalog.js";

describe("FileCatalogStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "stowage-catalog-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("loads nothing before the first save", async () => {
    expect(await new FileCatalogStore(join(root, "catalog.json")).load()).toBeUndefined();
  });

  it("reads back what it saved, dates included", async () => {
    const catalog = new FileCatalogStore(join(root, "nested", "catalog.json"));
    const snapshot: CatalogSnapshot = {
      version: 1,
      buckets: [
        {
          name: "photos",
          creationDate: new Date("2026-01-02T03:04:05.678Z"),
          objects: [
            {
              key: "a/b.txt",
              blobRef: newBlobReference(),
              contentType: "text/plain",
              contentLength: 3,
              etag: '"900150983cd24fb0d6963f7d28e17f72"',
              lastModified: new Date("2026-01-03T00:00:00.000Z"),
              metadata: { owner: "tests" },
            },
          ],
        },
      ],
    };

    await catalog.save(snapshot);

    expect(await catalog.load()).toEqual(snapshot);
    expect(await readdir(join(root, "nested"))).toEqual(["catalog.json"]);
  });

  it("rejects a catalog with a malformed blob reference", async () => {
    const path = join(root, "catalog.json");
    await writeFile(
      path,
      JSON.stringify({
        version: 1,
        buckets: [
          {
            name: "photos",
            creationDate: "2026-01-02T03:04:05.678Z",
            objects: [
              {
                key: "k",
                blobRef: "../../etc/passwd",
                contentType: "text/plain",
                contentLength: 0,
                etag: '""',
                lastModified: "2026-01-02T03:04:05.678Z",
                metadata: {},
              },
            ],
          },
        ],
      }),
    );

    await expect(new FileCatalogStore(path).load()).rejects.toBeInstanceOf(ValiError);
  });
});
