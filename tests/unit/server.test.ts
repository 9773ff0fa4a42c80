import { promises as fs } from "fs";
import http from "http";
import os from "os";
import path from "path";
import { PassThrough } from "stream";
import request from "supertest";
import { createApp } from "../../src/app";
import { DataAccessLayer } from "../../src/db/dataAccessLayer";
import type { AccessRecord } from "../../src/models/access";
import type { AccessLog } from "../../src/repositories/accessLog";
import { InMemoryTokenStore } from "../../src/repositories/tokenStore";
import { json } from "../../src/routing/handlers";
import { main, shutdown } from "../../src/server";
import { captureOutput, silentLogger, stubGet } from "../helpers";

describe("main", () => {
  const originalLevel = process.env.LOG_LEVEL;
  let dir: string;

  beforeEach(async () => {
    process.env.LOG_LEVEL = "silent";
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "qr-main-"));
  });

  afterEach(async () => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should exit with 1 when the configuration file is missing", async () => {
    expect(await main([path.join(dir, "missing.json")])).toBe(1);
  });

  it("should exit with 1 when the configuration is invalid", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, JSON.stringify({ server: { port: -1 } }));

    expect(await main([file])).toBe(1);
  });

  it("should exit with 0 after the console quits", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(
      file,
      JSON.stringify({
        server: { host: "127.0.0.1", port: 0 },
        log: { level: "silent" },
        metrics: { collectDefaults: false },
      })
    );
    const input = new PassThrough();
    const { output, text } = captureOutput();
    input.end("quit\n");

    expect(await main([file, "--console"], { input, output })).toBe(0);
    expect(text()).toBe('Type "help" for a list of commands.\nShutting down...\n');
  });
});

describe("shutdown", () => {
  it("should let an in-flight request finish and record it before closing storage", async () => {
    const events: string[] = [];
    const records: AccessRecord[] = [];
    const slowLog: AccessLog = {
      append: async (record) => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        records.push(record);
        events.push("append");
      },
      recent: async () => records,
    };
    const dataAccessLayer = new DataAccessLayer(new InMemoryTokenStore(), slowLog, async () => {
      events.push("close");
    });

    let entered = () => {};
    const handlerEntered = new Promise<void>((resolve) => {
      entered = () => resolve();
    });
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const { app, dispatcher } = createApp({
      dataAccessLayer,
      logger: silentLogger,
      collectDefaultMetrics: false,
      handlers: [
        stubGet("slow", [], async () => {
          entered();
          await gate;
          return json({ done: true });
        }),
      ],
    });

    const server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));

    const pending = request(server)
      .get("/api/public/slow")
      .set("Connection", "close")
      .then((response) => response);
    await handlerEntered;
    const stopping = shutdown(server, dispatcher, dataAccessLayer, silentLogger);
    release();

    const response = await pending;
    await stopping;

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ done: true });
    expect(records).toEqual([expect.objectContaining({ path: "/api/public/slow", statusCode: 200 })]);
    expect(events).toEqual(["append", "close"]);
    expect(server.listening).toBe(false);
  });
});
