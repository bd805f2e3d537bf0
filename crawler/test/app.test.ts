import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";
import { createApp } from "../src/app.js";
import { createLogger } from "../src/lib/logger.js";
import { WorkerPoolManager } from "../src/pool/manager.js";
import {
  createFakeWorkerFactory,
  holdJobs,
  waitFor,
  type RunBehavior,
} from "./helpers/fake-worker.js";

const logger = createLogger("silent");

const echoStartUrls: RunBehavior = (jobId, job, worker) => {
  worker.reply({
    type: "done",
    jobId,
    results: job.startUrls.map((url) => ({ url, text: `text of ${url}` })),
  });
};

let manager: WorkerPoolManager | null = null;

function buildApp(onRun: RunBehavior = echoStartUrls, size: number = 1) {
  const { factory } = createFakeWorkerFactory(onRun);
  manager = new WorkerPoolManager({ size, createWorker: factory, logger, killTimeoutMs: 50 });
  return createApp({ manager, logger });
}

afterEach(async () => {
  await manager?.shutdown();
  manager = null;
});

describe("POST /crawl", () => {
  it("returns the crawled pages", async () => {
    const res = await request(buildApp())
      .post("/crawl")
      .send({ start_urls: ["http://example.test/a"], allowed_domains: ["example.test"] });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "finished",
      results: [{ url: "http://example.test/a", html: "text of http://example.test/a" }],
    });
  });

  it("keeps answering other requests while a crawl is running", async () => {
    const { onRun, held } = holdJobs();
    const app = buildApp(onRun, 2);

    const crawling = request(app)
      .post("/crawl")
      .send({ start_urls: ["http://example.test/a"] })
      .then((res) => res);
    await waitFor(() => held.length === 1, 2_000);

    const health = await request(app).get("/health");
    expect(health.status).toBe(200);
    expect(health.body.pool).toEqual({
      live: true,
      size: 2,
      busy: 1,
      queued: 0,
      pendingJobs: 1,
    });

    held[0].worker.reply({ type: "done", jobId: held[0].jobId, results: [] });
    const res = await crawling;
    expect(res.body).toEqual({ status: "finished", results: [] });
  });

  it("rejects an empty start URL list", async () => {
    const res = await request(buildApp()).post("/crawl").send({ start_urls: [] });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: "error",
      results: [],
      message: "start_urls: start_urls must contain at least one URL",
    });
  });

  it("rejects a missing start URL list", async () => {
    const res = await request(buildApp()).post("/crawl").send({});

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("start_urls: Required");
  });

  it("rejects a malformed JSON body", async () => {
    const res = await request(buildApp())
      .post("/crawl")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      status: "error",
      code: "INVALID_JSON",
      message: "Request body must be valid JSON",
      results: [],
    });
  });
});

describe("POST /refresh_resources", () => {
  it("restarts the worker pool", async () => {
    const res = await request(buildApp()).post("/refresh_resources");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "refreshed_and_restarted",
      message: "Worker pools have been terminated and new pools are ready for immediate use.",
    });
  });
});

describe("GET /health", () => {
  it("reports the pool state", async () => {
    const res = await request(buildApp()).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "ok",
      pool: { live: false, size: 1, busy: 0, queued: 0, pendingJobs: 0 },
    });
  });
});

describe("unknown routes", () => {
  it("answer 404", async () => {
    const res = await request(buildApp()).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      status: "error",
      code: "NOT_FOUND",
      message: "No route for GET /nope",
    });
  });
});
