import { afterEach, describe, expect, it, vi } from "vitest";
import { TransientApiError } from "../src/errors.js";
import { findPackage, findPackagesByAuthor } from "../src/gallery/api.js";
import { httpClient } from "../src/utils/http.js";
import { axiosResponse } from "./fixtures.js";

const BASE = "https://gallery.test/api/v2";

function entry(id: string, version: string, downloads: string, latest: boolean, published: string) {
  return {
    Id: id,
    Version: version,
    DownloadCount: downloads,
    IsLatestVersion: latest,
    Published: published,
    GalleryDetailsUrl: `https://gallery.test/packages/${id}/${version}`
  };
}

describe("gallery feed", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("pages through an author's packages and keeps the latest version of each", async () => {
    const spy = vi.spyOn(httpClient, "request");
    spy.mockResolvedValueOnce(
      axiosResponse(200, {
        d: {
          results: [
            entry("TestModule", "1.0.0", "90", false, "2024-01-01T00:00:00Z"),
            entry("Other", "0.3.0", "12", true, "2024-02-01T00:00:00Z")
          ],
          __next: `${BASE}/Packages()?$skip=2`
        }
      })
    );
    spy.mockResolvedValueOnce(
      axiosResponse(200, { d: { results: [entry("TestModule", "1.2.0", "147", true, "2024-04-30T08:00:00Z")] } })
    );

    const packages = await findPackagesByAuthor("Jane", BASE);

    expect(spy).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({
        url: `${BASE}/Packages()?$filter=IsLatestVersion%20and%20Authors%20eq%20'Jane'`,
        headers: { Accept: "application/json;odata=verbose" }
      })
    );
    expect(spy).toHaveBeenNthCalledWith(2, expect.objectContaining({ url: `${BASE}/Packages()?$skip=2` }));
    expect(packages).toEqual([
      {
        name: "TestModule",
        version: "1.2.0",
        downloadCount: 147,
        published: "2024-04-30T08:00:00Z",
        description: undefined,
        url: "https://gallery.test/packages/TestModule/1.2.0"
      },
      {
        name: "Other",
        version: "0.3.0",
        downloadCount: 12,
        published: "2024-02-01T00:00:00Z",
        description: undefined,
        url: "https://gallery.test/packages/Other/0.3.0"
      }
    ]);
  });

  it("escapes quotes in the author filter", async () => {
    const spy = vi.spyOn(httpClient, "request").mockResolvedValueOnce(axiosResponse(200, { d: { results: [] } }));

    await expect(findPackagesByAuthor("O'Brien", BASE)).resolves.toEqual([]);
    expect(spy).toHaveBeenCalledWith(
      expect.objectContaining({ url: `${BASE}/Packages()?$filter=IsLatestVersion%20and%20Authors%20eq%20'O''Brien'` })
    );
  });

  it("looks up a single package by id", async () => {
    const spy = vi.spyOn(httpClient, "request").mockResolvedValueOnce(
      axiosResponse(200, { d: [entry("TestModule", "1.2.0", "147", true, "2024-04-30T08:00:00Z")] })
    );

    const pkg = await findPackage("TestModule", BASE);

    expect(spy).toHaveBeenCalledWith(expect.objectContaining({ url: `${BASE}/FindPackagesById()?id='TestModule'` }));
    expect(pkg?.downloadCount).toBe(147);
  });

  it("returns null for an unknown package", async () => {
    vi.spyOn(httpClient, "request").mockResolvedValueOnce(axiosResponse(404, null));
    await expect(findPackage("Missing", BASE)).resolves.toBeNull();
  });

  it("raises on other error statuses", async () => {
    vi.spyOn(httpClient, "request").mockResolvedValueOnce(axiosResponse(500, null));
    await expect(findPackagesByAuthor("Jane", BASE)).rejects.toBeInstanceOf(TransientApiError);
  });
});
