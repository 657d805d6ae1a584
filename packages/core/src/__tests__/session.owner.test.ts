import { describe, expect, it } from "vitest";
import { SqlGatewayClient } from "../gateway-client/client.js";
import { SessionOwner } from "../session/owner.js";
import { FakeSqlGateway } from "./helpers/fake-sql-gateway.js";
import { createHarness } from "./helpers/harness.js";
import { ManualClock } from "./helpers/manual-clock.js";

describe("session owner", () => {
  it("opens one session for concurrent first calls", async () => {
    const { gateway, service } = createHarness();

    const [first, second] = await Promise.all([service.getConfig(), service.getConfig()]);

    expect(first).toEqual({});
    expect(second).toEqual({});
    expect(gateway.sessionsOpened).toBe(1);
    expect(service.session.state).toBe("OPEN");
  });

  it("opens the session with the configured properties and name", async () => {
    const { gateway, service } = createHarness({
      config: { gateway: { sessionName: "mcp", sessionProperties: { "execution.runtime-mode": "streaming" } } }
    });

    expect(await service.getConfig()).toEqual({ "execution.runtime-mode": "streaming" });
    expect(gateway.requests[0]?.body).toEqual({
      properties: { "execution.runtime-mode": "streaming" },
      sessionName: "mcp"
    });
  });

  it("reflects a configured property in get_config", async () => {
    const { gateway, service } = createHarness();

    const applied = await service.configureSession("SET 'parallelism.default' = '4'");

    expect(applied).toEqual({ statement: "SET 'parallelism.default' = '4'", status: "FINISHED", timedOut: false });
    expect(await service.getConfig()).toEqual({ "parallelism.default": "4" });
    expect(gateway.operation("op-1").closed).toBe(true);
  });

  it("surfaces a failed configuration statement with the gateway's message", async () => {
    const { gateway, service } = createHarness();
    gateway.script(/^CREATE TABLE/, { statuses: ["RUNNING", "ERROR"], error: "Table `orders` already exists" });

    await expect(service.configureSession("CREATE TABLE orders (id INT)")).rejects.toMatchObject({
      code: "statement_error",
      statement: "CREATE TABLE orders (id INT)",
      message: "Table `orders` already exists"
    });
    expect(gateway.operation("op-1").closed).toBe(true);
  });

  it("reports a configuration statement still running at the deadline as timed out", async () => {
    const { gateway, clock, service } = createHarness({ timings: { configureTimeoutMs: 1_000 } });
    gateway.script(/^ADD JAR/, { statuses: ["RUNNING"] });

    const applied = await service.configureSession("ADD JAR '/opt/udf.jar'");

    expect(applied).toEqual({ statement: "ADD JAR '/opt/udf.jar'", status: "RUNNING", timedOut: true });
    expect(clock.now()).toBe(1_000);
  });

  it("re-opens a rejected session once and reports the statements it lost", async () => {
    const { gateway, service } = createHarness();
    await service.configureSession("SET 'parallelism.default' = '4'");
    gateway.expireSession("session-1");

    expect(await service.getConfig()).toEqual({});
    expect(service.session.opened).toBe(2);
    expect(service.drainNotices()).toEqual([
      "The SQL Gateway session was re-opened (Session 'session-1' does not exist.); these session statements were lost and must be re-applied: SET 'parallelism.default' = '4'"
    ]);
    expect(service.drainNotices()).toEqual([]);
  });

  it("fails a configuration statement whose session ends while it runs", async () => {
    const { gateway, service } = createHarness();
    await service.configureSession("SET 'parallelism.default' = '4'");
    gateway.beforeRequest = (request) => {
      if (request.path.endsWith("/status")) {
        gateway.expireSession("session-1");
      }
    };

    await expect(service.configureSession("SET 'pipeline.name' = 'orders'")).rejects.toMatchObject({
      code: "gateway_unreachable",
      message: "The SQL Gateway session ended while the statement was running: Session 'session-1' does not exist."
    });
    expect(service.session.state).toBe("UNOPENED");
    expect(service.drainNotices()).toEqual([
      "The SQL Gateway session was re-opened (Session 'session-1' does not exist.); these session statements were lost and must be re-applied: SET 'parallelism.default' = '4'"
    ]);
  });

  it("gives up when a freshly opened session is rejected too", async () => {
    const gateway = new FakeSqlGateway();
    const client = new SqlGatewayClient({ baseUrl: "http://gateway.test", fetchImpl: gateway.fetch });
    const session = new SessionOwner({ client, clock: new ManualClock() });

    await expect(
      session.withSession(async (sessionHandle) => {
        gateway.expireSession(sessionHandle);
        return await client.getSessionConfig(sessionHandle);
      })
    ).rejects.toMatchObject({
      code: "gateway_unreachable",
      message: "SQL Gateway rejected a freshly opened session: Session 'session-2' does not exist."
    });
    expect(gateway.sessionsOpened).toBe(2);
  });

  it("closes the session at shutdown", async () => {
    const { gateway, service } = createHarness();
    await service.getConfig();

    await service.shutdown();

    expect(gateway.sessionProperties("session-1")).toBeUndefined();
    expect(service.session.state).toBe("UNOPENED");
    expect(gateway.requests.at(-1)).toMatchObject({ method: "DELETE", path: "/v3/sessions/session-1" });
  });
});
