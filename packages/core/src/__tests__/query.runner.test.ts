import { describe, expect, it } from "vitest";
import type { StatementScript } from "./helpers/fake-sql-gateway.js";
import { createHarness } from "./helpers/harness.js";

describe("run_query_collect_and_stop", () => {
  it("returns exactly maxRows rows and stops the job it started", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM orders/, {
      statuses: ["RUNNING", "FINISHED"],
      jobId: "job-orders",
      columns: ["id"],
      pages: [{ rows: [[1], [2], [3]] }, { rows: [[4], [5], [6]] }],
      endless: true
    });

    const result = await service.runQueryCollectAndStop("SELECT id FROM orders", { maxRows: 4, maxSeconds: 10 });

    expect(result.rows.map((row) => row.fields.id)).toEqual([1, 2, 3, 4]);
    expect(result).toMatchObject({
      rowCount: 4,
      exhausted: false,
      status: "FINISHED",
      timedOut: false,
      jobId: "job-orders",
      stopRequested: true
    });
    expect(result.stopError).toBeUndefined();
    expect(result.columns.map((column) => column.name)).toEqual(["id"]);
    expect(gateway.stoppedJobs).toEqual(["job-orders"]);
    expect(gateway.operation("op-1").closed).toBe(true);
    expect(gateway.operation("op-2")).toMatchObject({ statement: "STOP JOB 'job-orders'", closed: true });
  });

  it("returns the rows of a page that already ends the stream without asking for more", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/VALUES/, {
      jobId: "job-values",
      columns: ["x"],
      pages: [{ resultType: "EOS", rows: [[1], [2], [3]] }]
    });

    const result = await service.runQueryCollectAndStop("SELECT x FROM (VALUES (1), (2), (3)) AS t(x)", { maxRows: 5 });

    expect(result.rows.map((row) => row.fields.x)).toEqual([1, 2, 3]);
    expect(result.exhausted).toBe(true);
    expect(result.stopRequested).toBe(true);
    expect(gateway.operation("op-1").fetchedTokens).toEqual([0]);
    expect(gateway.stoppedJobs).toEqual(["job-values"]);
  });

  it("does not issue a stop when no job id was reported", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/^SHOW TABLES/, {
      columns: ["table name"],
      pages: [{ resultType: "EOS", rows: [["orders"], ["clicks"], ["users"]] }]
    });

    const result = await service.runQueryCollectAndStop("SHOW TABLES", { maxRows: 5 });

    expect(result.rowCount).toBe(3);
    expect(result.exhausted).toBe(true);
    expect(result.stopRequested).toBe(false);
    expect(result.jobId).toBeUndefined();
    expect(gateway.statements).toEqual(["SHOW TABLES"]);
  });

  it("stops fetching once maxSeconds has elapsed", async () => {
    const { gateway, clock, service } = createHarness();
    gateway.script(/FROM clicks/, { jobId: "job-clicks", pages: [{ resultType: "NOT_READY" }], endless: true });

    const result = await service.runQueryCollectAndStop("SELECT * FROM clicks", { maxRows: 10, maxSeconds: 2 });

    expect(result.rowCount).toBe(0);
    expect(result.exhausted).toBe(false);
    expect(clock.now()).toBe(2_000);
    expect(clock.sleeps.every((ms) => ms <= 100)).toBe(true);
    expect(gateway.operation("op-1").fetchedTokens).toHaveLength(20);
    expect(gateway.stoppedJobs).toEqual(["job-clicks"]);
  });

  it("still reads buffered rows when the statement is running at the deadline", async () => {
    const { gateway, clock, service } = createHarness();
    gateway.script(/FROM events/, {
      statuses: ["RUNNING"],
      jobId: "job-events",
      columns: ["id"],
      pages: [{ rows: [[7], [8]] }],
      endless: true
    });

    const result = await service.runQueryCollectAndStop("SELECT id FROM events", { maxRows: 5, maxSeconds: 1 });

    expect(result.rows.map((row) => row.fields.id)).toEqual([7, 8]);
    expect(result).toMatchObject({ status: "RUNNING", timedOut: true, stopRequested: true });
    expect(clock.now()).toBe(1_000);
  });

  it("closes a stop still running at the deadline once it has settled", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM clicks/, {
      jobId: "job-clicks",
      columns: ["id"],
      pages: [{ resultType: "EOS", rows: [[1]] }]
    });
    const stopScript: StatementScript = { statuses: ["RUNNING"] };
    gateway.script(/^STOP JOB/, stopScript);

    const result = await service.runQueryCollectAndStop("SELECT id FROM clicks", { maxSeconds: 1 });

    expect(result.stopError).toBeUndefined();
    expect(gateway.operation("op-2")).toMatchObject({ statement: "STOP JOB 'job-clicks'", closed: false });
    expect(service.session.deferred).toBe(1);

    stopScript.statuses = ["FINISHED"];
    await service.runQueryCollectAndStop("SHOW TABLES");

    expect(gateway.operation("op-2").closed).toBe(true);
    expect(service.session.deferred).toBe(0);
  });

  it("fails as gateway_unreachable when the session ends while the query runs", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM orders/, { statuses: ["RUNNING"], jobId: "job-orders", pages: [{ rows: [[1]] }], endless: true });
    gateway.beforeRequest = (request) => {
      if (request.path.endsWith("/status")) {
        gateway.expireSession("session-1");
      }
    };

    await expect(service.runQueryCollectAndStop("SELECT id FROM orders")).rejects.toMatchObject({
      code: "gateway_unreachable",
      message: "The SQL Gateway session ended while the statement was running: Session 'session-1' does not exist."
    });
    expect(service.session.state).toBe("UNOPENED");
    expect(gateway.stoppedJobs).toEqual([]);

    gateway.beforeRequest = undefined;
    expect(await service.getConfig()).toEqual({});
    expect(gateway.sessionsOpened).toBe(2);
  });

  it("reports a failed stop without failing the call", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM orders/, { jobId: "job-orders", columns: ["id"], pages: [{ rows: [[1]] }], endless: true });
    gateway.script(/^STOP JOB/, { statuses: ["ERROR"], error: "Job job-orders is not running" });

    const result = await service.runQueryCollectAndStop("SELECT id FROM orders", { maxRows: 1 });

    expect(result.rowCount).toBe(1);
    expect(result.stopRequested).toBe(true);
    expect(result.stopError).toBe("Job job-orders is not running");
    expect(gateway.operation("op-2").closed).toBe(true);
  });

  it("fails with the gateway's message when the query errors, closing the operation", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM missing/, { statuses: ["PENDING", "ERROR"], error: "Object 'missing' not found" });

    await expect(service.runQueryCollectAndStop("SELECT * FROM missing")).rejects.toMatchObject({
      code: "statement_error",
      message: "Object 'missing' not found"
    });
    expect(gateway.operation("op-1").closed).toBe(true);
  });

  it("returns no rows for maxRows 0 but still stops the job", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM orders/, { jobId: "job-orders", pages: [{ rows: [[1], [2]] }], endless: true });

    const result = await service.runQueryCollectAndStop("SELECT id FROM orders", { maxRows: 0 });

    expect(result.rows).toEqual([]);
    expect(gateway.operation("op-1").fetchedTokens).toEqual([0]);
    expect(gateway.stoppedJobs).toEqual(["job-orders"]);
  });
});

describe("run_query_stream_start", () => {
  it("tracks the job reported on the first page and leaves it running", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/^INSERT INTO sink/, { jobId: "abc123", pages: [{ rows: [] }], endless: true });

    expect(await service.runQueryStreamStart("INSERT INTO sink SELECT * FROM source")).toEqual({ jobId: "abc123" });
    expect(service.tracker.lookup("abc123")).toMatchObject({
      operationHandle: "op-1",
      sessionHandle: "session-1",
      nextToken: 0
    });
    expect(gateway.operation("op-1").closed).toBe(false);
    expect(gateway.stoppedJobs).toEqual([]);
  });

  it("fails with no_job_id when the first page carries no job id", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/^SHOW TABLES/, { pages: [{ rows: [["orders"]] }] });

    await expect(service.runQueryStreamStart("SHOW TABLES")).rejects.toMatchObject({ code: "no_job_id" });
    expect(gateway.operation("op-1").closed).toBe(true);
    expect(service.tracker.size).toBe(0);
  });

  it("surfaces a failed statement and tracks nothing", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM source/, { statuses: ["ERROR"], error: "Object 'source' not found" });

    await expect(service.runQueryStreamStart("INSERT INTO sink SELECT * FROM source")).rejects.toMatchObject({
      code: "statement_error",
      message: "Object 'source' not found"
    });
    expect(service.tracker.size).toBe(0);
    expect(gateway.operation("op-1").closed).toBe(true);
  });

  it("fails as gateway_unreachable when the session ends before the first page is read", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/^INSERT INTO sink/, { jobId: "abc123", pages: [{ rows: [] }], endless: true });
    gateway.beforeRequest = (request) => {
      if (request.path.includes("/result/")) {
        gateway.expireSession("session-1");
      }
    };

    await expect(service.runQueryStreamStart("INSERT INTO sink SELECT * FROM source")).rejects.toMatchObject({
      code: "gateway_unreachable",
      message: "The SQL Gateway session ended while the statement was running: Session 'session-1' does not exist."
    });
    expect(service.tracker.size).toBe(0);
    expect(service.session.state).toBe("UNOPENED");
  });

  it("rejects a second statement that reports an already tracked job id", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/FROM source/, { jobId: "job-dup", pages: [{ rows: [] }], endless: true });

    await service.runQueryStreamStart("INSERT INTO sink SELECT * FROM source");
    await expect(service.runQueryStreamStart("INSERT INTO sink2 SELECT * FROM source")).rejects.toMatchObject({
      code: "job_already_tracked",
      jobId: "job-dup"
    });

    expect(service.tracker.lookup("job-dup").operationHandle).toBe("op-1");
    expect(gateway.operation("op-1").closed).toBe(false);
    expect(gateway.operation("op-2").closed).toBe(true);
  });
});
