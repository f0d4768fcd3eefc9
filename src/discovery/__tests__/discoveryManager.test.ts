import { Response } from "undici";
import { afterEach, describe, expect, it } from "vitest";

import { ArchiveClient } from "../../api/archiveClient";
import { CaptchaDetectedError } from "../../api/errors";
import { RateLimitedClient, clientOptionsFromConfig } from "../../api/rateLimitedClient";
import { DEFAULT_CONFIG } from "../../config/loadConfig";
import type { FetchFn } from "../../core/fetch";
import { createSilentLogger } from "../../observability";
import { ResponseProcessor } from "../../processing/responseProcessor";
import { SqliteStore } from "../../store/sqliteStore";
import type { Page, Periodical } from "../../types";
import { DiscoveryManager } from "../discoveryManager";
import { FakeArchiveApi, createFakeClock, issueUrl, searchItem } from "./fakeArchiveApi";

const stores: SqliteStore[] = [];

function setup(signal?: AbortSignal) {
  const api = new FakeArchiveApi();
  const store = new SqliteStore(":memory:");
  stores.push(store);
  const clock = createFakeClock(60_000);
  const manager = new DiscoveryManager({
    api,
    store,
    processor: new ResponseProcessor("https://archive.test"),
    captchaManager: clock.captchaManager,
    logger: createSilentLogger(),
    captchaPollIntervalMs: 30_000,
    sleep: clock.sleep,
    signal,
  });
  return { api, store, clock, manager };
}

function storedPage(lccn: string, date: string, sequence: number): Page {
  return {
    itemId: `/lccn/${lccn}/${date}/ed-1/seq-${sequence}/`,
    lccn,
    title: "Daily Bugle",
    date,
    edition: 1,
    sequence,
    pageUrl: `https://archive.test/lccn/${lccn}/${date}/ed-1/seq-${sequence}/`,
    pdfUrl: null,
    jp2Url: null,
    ocrText: null,
    wordCount: null,
  };
}

function periodical(lccn: string, overrides: Partial<Periodical> = {}): Periodical {
  return {
    lccn,
    title: lccn,
    state: null,
    city: null,
    startYear: null,
    endYear: null,
    frequency: null,
    language: null,
    subject: null,
    url: null,
    ...overrides,
  };
}

const FIVE_ITEMS = [1, 2, 3, 4, 5].map((day) => searchItem("sn1", `1910-05-0${day}`, 1));

afterEach(async () => {
  for (const store of stores.splice(0)) {
    await store.close();
  }
});

describe("DiscoveryManager.discoverFacetContent", () => {
  it("pages through results until a short page and completes the facet", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS;
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    expect(await manager.discoverFacetContent(facet.id, 2)).toBe(5);

    expect(api.searchQueries.map((query) => query.page)).toEqual([1, 2, 3]);
    expect(api.searchQueries[0]).toEqual({ page: 1, rows: 2, andtext: undefined, date1: "1910", date2: "1910" });
    expect(await store.getFacet(facet.id)).toMatchObject({
      status: "completed",
      errorMessage: null,
      itemsDiscovered: 5,
      actualItems: 5,
      currentPage: 1,
      resumeFromPage: 1,
      lastBatchSize: 2,
    });
    expect((await store.getDiscoveryStats()).pages).toBe(5);
  });

  it("stops at maxItems and still completes the facet", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS;
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    expect(await manager.discoverFacetContent(facet.id, 2, 3)).toBe(3);

    expect(api.searchQueries.map((query) => query.page)).toEqual([1, 2]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "completed", itemsDiscovered: 3 });
  });

  it("returns zero for a completed facet without calling the archive", async () => {
    const { api, store, manager } = setup();
    const { facet } = await store.createFacet({ facetType: "state", facetValue: "Ohio" });
    await store.updateFacet(facet.id, { status: "completed", itemsDiscovered: 7 });

    expect(await manager.discoverFacetContent(facet.id)).toBe(0);
    expect(api.searchQueries).toEqual([]);
  });

  it("resumes from the stored cursor", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS;
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });
    await store.updateFacet(facet.id, { status: "discovering", itemsDiscovered: 4, currentPage: 2, resumeFromPage: 3 });

    expect(await manager.discoverFacetContent(facet.id, 2)).toBe(1);

    expect(api.searchQueries.map((query) => query.page)).toEqual([3]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "completed", itemsDiscovered: 5 });
  });

  it("repairs a facet wrongly marked completed and continues after its last page", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS;
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });
    await store.updateFacet(facet.id, { status: "completed", itemsDiscovered: 4, currentPage: 2 });

    expect(await manager.discoverFacetContent(facet.id, 2)).toBe(1);

    expect(api.searchQueries.map((query) => query.page)).toEqual([3]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "completed", errorMessage: null, itemsDiscovered: 5 });
  });

  it("records the failure on the facet and rethrows", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS;
    api.beforeCall = (method) => {
      if (method === "searchPages" && api.searchQueries.length === 1) {
        throw new Error("archive unavailable");
      }
    };
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    await expect(manager.discoverFacetContent(facet.id, 2)).rejects.toThrow("archive unavailable");

    expect(await store.getFacet(facet.id)).toMatchObject({
      status: "error",
      errorMessage: "archive unavailable",
      itemsDiscovered: 2,
      currentPage: 1,
      resumeFromPage: 2,
    });
  });

  it("waits out a CAPTCHA and retries the same page", async () => {
    const { api, store, clock, manager } = setup();
    api.searchResults = FIVE_ITEMS.slice(0, 3);
    let challenged = false;
    api.beforeCall = (method) => {
      if (method === "searchPages" && !challenged) {
        challenged = true;
        clock.captchaManager.recordCaptcha("search/pages/results/");
        throw new CaptchaDetectedError("search/pages/results/", "challenge page");
      }
    };
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    expect(await manager.discoverFacetContent(facet.id, 2)).toBe(3);

    expect(clock.sleeps).toEqual([30_000, 30_000]);
    expect(api.searchQueries.map((query) => query.page)).toEqual([1, 2]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "completed", errorMessage: null });
  });

  it("keeps paging when the requested batch exceeds the per-request row limit", async () => {
    const store = new SqliteStore(":memory:");
    stores.push(store);
    const clock = createFakeClock(60_000);
    const items = Array.from({ length: 2_500 }, (_, index) => searchItem("sn1", "1910-05-01", index + 1));
    const requested: string[] = [];
    const fetchFn: FetchFn = async (url) => {
      const params = new URL(url).searchParams;
      const page = Number(params.get("page"));
      const rows = Number(params.get("rows"));
      requested.push(`${page}:${rows}`);
      const body = { totalItems: items.length, items: items.slice((page - 1) * rows, page * rows) };
      return new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" } });
    };
    const client = new RateLimitedClient(
      { ...clientOptionsFromConfig(DEFAULT_CONFIG), baseUrl: "https://archive.test/" },
      { captchaManager: clock.captchaManager, logger: createSilentLogger(), fetchFn, now: clock.now, sleep: clock.sleep },
    );
    const manager = new DiscoveryManager({
      api: new ArchiveClient(client, createSilentLogger()),
      store,
      processor: new ResponseProcessor("https://archive.test"),
      captchaManager: clock.captchaManager,
      logger: createSilentLogger(),
      captchaPollIntervalMs: 30_000,
      sleep: clock.sleep,
    });
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    expect(await manager.discoverFacetContent(facet.id, 2_000)).toBe(2_500);

    expect(requested).toEqual(["1:1000", "2:1000", "3:1000"]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "completed", actualItems: 2_500, lastBatchSize: 1_000 });
  });

  it("leaves the facet resumable when interrupted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { api, store, manager } = setup(controller.signal);
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });

    expect(await manager.discoverFacetContent(facet.id, 2)).toBe(0);

    expect(api.searchQueries).toEqual([]);
    expect(await store.getFacet(facet.id)).toMatchObject({ status: "discovering", resumeFromPage: 1 });
  });
});

describe("DiscoveryManager planning", () => {
  it("creates date range facets once and estimates only new ones", async () => {
    const { api, store, manager } = setup();
    api.estimate = 42;

    const first = await manager.createDateRangeFacets(1900, 1904, 2, true);
    expect(first.map((facet) => facet.facetValue)).toEqual(["1900/1901", "1902/1903", "1904/1904"]);
    expect(first.map((facet) => facet.estimatedItems)).toEqual([42, 42, 42]);
    expect(api.estimateQueries[0]).toEqual({ page: 1, rows: 1, andtext: undefined, date1: "1900", date2: "1901" });

    const again = await manager.createDateRangeFacets(1900, 1904, 2, true);
    expect(again.map((facet) => facet.id)).toEqual(first.map((facet) => facet.id));
    expect(api.estimateQueries).toHaveLength(3);
    expect(await store.listFacets()).toHaveLength(3);
  });

  it("creates state facets sized by the periodicals known in each state", async () => {
    const { store, manager } = setup();
    await store.upsertPeriodicals([
      periodical("sn1", { state: "Ohio" }),
      periodical("sn2", { state: "Ohio" }),
      periodical("sn3", { state: "Texas" }),
    ]);

    const facets = await manager.createStateFacets();
    expect(facets.map((facet) => [facet.facetValue, facet.estimatedItems])).toEqual([
      ["Ohio", 2000],
      ["Texas", 1000],
    ]);
  });

  it("repairs only facets whose completion is inconsistent", async () => {
    const { store, manager } = setup();
    const broken = await store.createFacet({ facetType: "state", facetValue: "Ohio" });
    const clean = await store.createFacet({ facetType: "state", facetValue: "Texas" });
    const explained = await store.createFacet({ facetType: "state", facetValue: "Utah" });
    await store.updateFacet(broken.facet.id, { status: "completed", currentPage: 4 });
    await store.updateFacet(clean.facet.id, { status: "completed" });
    await store.updateFacet(explained.facet.id, { status: "completed", currentPage: 4, errorMessage: "stopped" });

    expect(await manager.fixIncorrectlyCompletedFacets()).toBe(1);
    expect(await store.getFacet(broken.facet.id)).toMatchObject({ status: "discovering", resumeFromPage: 5 });
    expect((await store.getFacet(explained.facet.id))?.status).toBe("completed");
  });

  it("discovers every facet that is not completed", async () => {
    const { api, store, manager } = setup();
    api.searchResults = FIVE_ITEMS.slice(0, 3);
    await store.createFacet({ facetType: "date_range", facetValue: "1910/1910" });
    const done = await store.createFacet({ facetType: "date_range", facetValue: "1911/1911" });
    await store.updateFacet(done.facet.id, { status: "completed" });

    expect(await manager.discoverPendingFacets(2)).toBe(3);
    expect(api.searchQueries.every((query) => query.date1 === "1910")).toBe(true);
  });
});

describe("DiscoveryManager periodicals", () => {
  it("follows totalPages of the newspaper list", async () => {
    const { api, manager } = setup();
    api.newspaperPages = [
      { totalPages: 2, newspapers: [{ lccn: "sn1", title: "A" }, { lccn: "sn2", title: "B" }] },
      { totalPages: 2, newspapers: [{ lccn: "sn3", title: "C" }] },
    ];

    expect(await manager.discoverPeriodicals()).toBe(3);
    expect(api.newspaperRequests).toEqual([1, 2]);
  });

  it("honours maxPages", async () => {
    const { api, manager } = setup();
    api.newspaperPages = [
      { totalPages: 2, newspapers: [{ lccn: "sn1", title: "A" }] },
      { totalPages: 2, newspapers: [{ lccn: "sn3", title: "C" }] },
    ];

    expect(await manager.discoverPeriodicals(1)).toBe(1);
    expect(api.newspaperRequests).toEqual([1]);
  });

  it("stores issues and marks the periodical discovered", async () => {
    const { api, store, manager } = setup();
    await store.upsertPeriodicals([periodical("sn1")]);
    api.details.set("sn1", {
      lccn: "sn1",
      issues: [
        { url: issueUrl("sn1", "1910-05-01"), date_issued: "1910-05-01" },
        { url: issueUrl("sn1", "1910-05-02"), date_issued: "1910-05-02" },
      ],
    });

    expect(await manager.discoverPeriodicalIssues("sn1")).toBe(2);
    expect(await store.getPeriodical("sn1")).toMatchObject({
      totalIssues: 2,
      issuesDiscovered: 2,
      discoveryComplete: true,
    });
  });
});

describe("DiscoveryManager queueing", () => {
  it("enqueues undownloaded facet pages once, at the facet's priority", async () => {
    const { store, manager } = setup();
    await store.upsertPages([
      storedPage("sn1", "1906-04-18", 1),
      storedPage("sn1", "1906-04-18", 2),
      storedPage("sn1", "1907-01-01", 1),
    ]);
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1906/1906" });

    expect(await manager.enqueueFacetContent(facet.id)).toBe(2);
    expect(await manager.enqueueFacetContent(facet.id)).toBe(0);

    const queue = await store.listQueue();
    expect(queue.map((item) => [item.referenceId, item.priority])).toEqual([
      ["/lccn/sn1/1906-04-18/ed-1/seq-1/", 1],
      ["/lccn/sn1/1906-04-18/ed-1/seq-2/", 1],
    ]);
  });

  it("gives every page of a state facet the state's priority, whatever its date", async () => {
    const { store, manager } = setup();
    await store.upsertPeriodicals([
      periodical("sn1", { state: "California" }),
      periodical("sn2", { state: "Ohio" }),
    ]);
    await store.upsertPages([
      storedPage("sn1", "1906-04-18", 1),
      storedPage("sn1", "1918-07-04", 1),
      storedPage("sn2", "1906-04-18", 1),
    ]);
    const california = await store.createFacet({ facetType: "state", facetValue: "California" });
    const ohio = await store.createFacet({ facetType: "state", facetValue: "Ohio" });

    expect(await manager.enqueueFacetContent(california.facet.id)).toBe(2);
    expect(await manager.enqueueFacetContent(ohio.facet.id)).toBe(1);

    const queue = await store.listQueue();
    expect(queue.map((item) => [item.referenceId, item.priority])).toEqual([
      ["/lccn/sn1/1906-04-18/ed-1/seq-1/", 4],
      ["/lccn/sn1/1918-07-04/ed-1/seq-1/", 4],
      ["/lccn/sn2/1906-04-18/ed-1/seq-1/", 5],
    ]);
  });

  it("caps the number of pages enqueued", async () => {
    const { store, manager } = setup();
    await store.upsertPages([storedPage("sn1", "1906-04-18", 1), storedPage("sn1", "1906-04-18", 2)]);
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1906/1906" });

    expect(await manager.enqueueFacetContent(facet.id, 1)).toBe(1);
  });

  it("skips facets that cannot be mapped to stored pages", async () => {
    const { store, manager } = setup();
    const { facet } = await store.createFacet({ facetType: "language", facetValue: "German" });

    expect(await manager.enqueueFacetContent(facet.id)).toBe(0);
  });

  it("queues completed facets and discovered periodicals by priority", async () => {
    const { store, manager } = setup();
    await store.upsertPeriodicals([
      periodical("sn9", { title: "Evening Star", startYear: 1880, endYear: 1922, frequency: "Daily" }),
    ]);
    await store.updatePeriodicalDiscovery("sn9", { totalIssues: 10, discoveryComplete: true });
    const { facet } = await store.createFacet({ facetType: "date_range", facetValue: "1918/1918" });
    await store.updateFacet(facet.id, { status: "completed", actualItems: 3 });

    expect(await manager.populateDownloadQueue(1)).toBe(1);
    expect(await manager.populateDownloadQueue()).toBe(1);

    const queue = await store.listQueue();
    expect(queue.map((item) => [item.queueType, item.referenceId, item.priority, item.estimatedSizeMb])).toEqual([
      ["facet", String(facet.id), 2, 3],
      ["periodical", "sn9", 4, 40],
    ]);
  });
});

describe("DiscoveryManager.getDiscoverySummary", () => {
  it("combines stored counts with a summary of the known newspapers", async () => {
    const { store, manager } = setup();
    await store.upsertPeriodicals([
      periodical("sn1", { title: "Daily Bugle", state: "Ohio", language: "English", startYear: 1880, endYear: 1922 }),
      periodical("sn2", { title: "Evening Star", state: "Ohio", language: "English", startYear: 1900, endYear: 1910 }),
      periodical("sn3", { title: "Lone Star", state: "Texas" }),
    ]);
    await store.upsertPages([storedPage("sn1", "1910-05-01", 1)]);

    const summary = await manager.getDiscoverySummary();

    expect(summary).toMatchObject({ periodicals: 3, pages: 1, pagesDownloaded: 0 });
    expect(summary.newspapers).toEqual({
      totalNewspapers: 3,
      states: { Ohio: 2, Texas: 1 },
      languages: { English: 2 },
      yearRange: [1880, 1922],
      sampleTitles: ["Daily Bugle", "Evening Star", "Lone Star"],
    });
  });
});
