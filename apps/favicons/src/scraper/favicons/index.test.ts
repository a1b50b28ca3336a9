import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { createHttpStub, iconBytes, StubRoute } from "../../__tests__/utils/http-stub";
import {
  createTempCacheDir,
  removeTempCacheDir,
} from "../../__tests__/utils/meta";
import {
  FaviconOptions,
  OrganizationRef,
  resolveFavicon,
  resolveFaviconOutcome,
  resolveFavicons,
} from ".";

const org: OrganizationRef = {
  name: "Acme Food Bank",
  websiteURL: "acme.example.org/about",
};

const siteRoot = "https://acme.example.org/";
const serviceUrl =
  "https://icons.example.com/s2/favicons?domain=acme.example.org&sz=64";

function htmlRoute(head: string): StubRoute {
  return {
    contentType: "text/html; charset=utf-8",
    body: `<!doctype html><html><head>${head}</head><body></body></html>`,
  };
}

function pngRoute(size = 500): StubRoute {
  return { contentType: "image/png", body: iconBytes(size) };
}

describe("resolveFavicon", () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await createTempCacheDir();
  });

  afterEach(async () => {
    await removeTempCacheDir(cacheDir);
  });

  function options(
    routes: Record<string, StubRoute>,
    overrides: Partial<FaviconOptions> = {},
  ) {
    const stub = createHttpStub(routes);
    const opts: FaviconOptions = {
      cacheDir,
      http: stub.http,
      politenessDelayMs: 0,
      serviceUrl: "https://icons.example.com/s2/favicons",
      serviceSize: 64,
      ...overrides,
    };
    return { stub, opts };
  }

  it("downloads the best icon declared in the page", async () => {
    const { stub, opts } = options({
      [siteRoot]: htmlRoute(
        `<link rel="icon" href="/small.png" sizes="16x16">
         <link rel="apple-touch-icon" href="/touch.png">`,
      ),
      "https://acme.example.org/touch.png": pngRoute(),
    });

    expect(await resolveFaviconOutcome(org, opts)).toEqual({
      filename: "acme-food-bank.png",
      source: "network",
    });
    expect(stub.requests).toEqual([siteRoot, "https://acme.example.org/touch.png"]);
    expect(await readFile(path.join(cacheDir, "acme-food-bank.png"))).toEqual(
      iconBytes(500),
    );
  });

  it("moves to the next candidate when one is rejected", async () => {
    const { stub, opts } = options({
      [siteRoot]: htmlRoute(
        `<link rel="apple-touch-icon" href="/touch.png">
         <link rel="icon" href="/favicon.svg">`,
      ),
      "https://acme.example.org/touch.png": pngRoute(20),
      "https://acme.example.org/favicon.svg": {
        contentType: "image/svg+xml",
        body: iconBytes(250),
      },
    });

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.svg");
    expect(stub.requests).toHaveLength(3);
  });

  it("falls back to common paths when the page has no icons", async () => {
    const { stub, opts } = options({
      [siteRoot]: htmlRoute(`<title>Acme</title>`),
      "https://acme.example.org/favicon.png": pngRoute(),
    });

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.png");
    expect(stub.requests).toEqual([
      siteRoot,
      "https://acme.example.org/favicon.ico",
      "https://acme.example.org/favicon.png",
    ]);
  });

  it("falls back to common paths when the page cannot be fetched", async () => {
    const { stub, opts } = options({
      [siteRoot]: "timeout",
      "https://acme.example.org/favicon.ico": {
        contentType: "image/x-icon",
        body: iconBytes(300),
      },
    });

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.ico");
    expect(stub.requests).toHaveLength(2);
  });

  it("uses the icon service as the last resort", async () => {
    const { stub, opts } = options({
      [serviceUrl]: pngRoute(),
    });

    expect(await resolveFaviconOutcome(org, opts)).toEqual({
      filename: "acme-food-bank.png",
      source: "network",
    });
    expect(stub.requests).toHaveLength(20);
    expect(stub.requests[19]).toBe(serviceUrl);
  });

  it("returns null when every strategy fails", async () => {
    const { stub, opts } = options({});

    expect(await resolveFaviconOutcome(org, opts)).toEqual({
      filename: null,
      source: "missing",
    });
    expect(stub.requests).toHaveLength(20);
  });

  it("reuses a cached icon without any request", async () => {
    await writeFile(path.join(cacheDir, "acme-food-bank.ico"), iconBytes(120));
    const { stub, opts } = options({ [serviceUrl]: pngRoute() });

    expect(await resolveFaviconOutcome(org, opts)).toEqual({
      filename: "acme-food-bank.ico",
      source: "cache",
    });
    expect(stub.requests).toEqual([]);
  });

  it("shares a cached icon between names with the same slug", async () => {
    await writeFile(path.join(cacheDir, "acme-inc.png"), iconBytes(120));
    const { stub, opts } = options({ [serviceUrl]: pngRoute() });

    expect(
      await resolveFaviconOutcome(
        { name: "ACME Inc", websiteURL: "acme.example.org" },
        opts,
      ),
    ).toEqual({ filename: "acme-inc.png", source: "cache" });
    expect(stub.requests).toEqual([]);
  });

  it("overwrites a cached icon when refetching", async () => {
    await writeFile(path.join(cacheDir, "acme-food-bank.png"), "old");
    const { opts } = options(
      { [serviceUrl]: pngRoute(600) },
      { forceRefetch: true },
    );

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.png");
    expect(await readFile(path.join(cacheDir, "acme-food-bank.png"))).toEqual(
      iconBytes(600),
    );
  });

  it("returns null for an empty website even with a cached icon", async () => {
    await writeFile(path.join(cacheDir, "acme-food-bank.png"), iconBytes(120));
    const { stub, opts } = options({});

    expect(
      await resolveFaviconOutcome({ name: org.name, websiteURL: "  " }, opts),
    ).toEqual({ filename: null, source: "skipped" });
    expect(stub.requests).toEqual([]);
  });

  it("skips organizations whose name has no slug", async () => {
    const { stub, opts } = options({});

    expect(
      await resolveFavicon({ name: "!!!", websiteURL: "acme.example.org" }, opts),
    ).toBeNull();
    expect(stub.requests).toEqual([]);
  });

  it("creates the cache directory", async () => {
    const nested = path.join(cacheDir, "site", "favicon");
    const { opts } = options({ [serviceUrl]: pngRoute() }, { cacheDir: nested });

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.png");
    expect(await readFile(path.join(nested, "acme-food-bank.png"))).toEqual(
      iconBytes(500),
    );
  });

  it("tries at most the configured number of page candidates", async () => {
    const links = Array.from(
      { length: 11 },
      (_, i) => `<link rel="icon" href="/i${i}.png">`,
    ).join("");
    const { stub, opts } = options({ [siteRoot]: htmlRoute(links) });

    await resolveFavicon(org, opts);

    expect(stub.requests.slice(0, 11)).toEqual([
      siteRoot,
      ...Array.from({ length: 10 }, (_, i) => `https://acme.example.org/i${i}.png`),
    ]);
    expect(stub.requests).not.toContain("https://acme.example.org/i10.png");
  });

  it("requests a repeated icon url once", async () => {
    const { stub, opts } = options({
      [siteRoot]: htmlRoute(
        `<link rel="icon" href="/dup.png" sizes="32x32">
         <link rel="apple-touch-icon" href="/dup.png">`,
      ),
    });

    await resolveFavicon(org, opts);

    expect(
      stub.requests.filter(url => url === "https://acme.example.org/dup.png"),
    ).toHaveLength(1);
  });

  it("extracts links with the markup parser", async () => {
    const { opts } = options(
      {
        [siteRoot]: htmlRoute(`<link href="/brand.gif" rel="shortcut icon">`),
        "https://acme.example.org/brand.gif": {
          contentType: "image/gif",
          body: iconBytes(180),
        },
      },
      { iconLinkParser: "markup" },
    );

    expect(await resolveFavicon(org, opts)).toBe("acme-food-bank.gif");
  });
});

describe("resolveFavicons", () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await createTempCacheDir();
  });

  afterEach(async () => {
    await removeTempCacheDir(cacheDir);
  });

  it("resolves each slug once and counts outcomes", async () => {
    const { http, requests } = createHttpStub({
      "https://acme.example.org/": htmlRoute(`<link rel="icon" href="/a.png">`),
      "https://acme.example.org/a.png": pngRoute(),
    });

    const { results, summary } = await resolveFavicons(
      [
        { name: "Acme, Inc.", websiteURL: "acme.example.org" },
        { name: "ACME Inc", websiteURL: "https://acme.example.org" },
        { name: "No Site", websiteURL: "" },
      ],
      {
        cacheDir,
        http,
        forceRefetch: true,
        politenessDelayMs: 0,
        serviceUrl: "https://icons.example.com/s2/favicons",
      },
    );

    expect(results.map(r => [r.organization.name, r.filename, r.source])).toEqual([
      ["Acme, Inc.", "acme-inc.png", "network"],
      ["ACME Inc", "acme-inc.png", "cache"],
      ["No Site", null, "skipped"],
    ]);
    expect(summary).toEqual({ cache: 1, network: 1, missing: 0, skipped: 1 });
    expect(requests).toEqual([
      "https://acme.example.org/",
      "https://acme.example.org/a.png",
    ]);
  });
});
