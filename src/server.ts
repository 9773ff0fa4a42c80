#!/usr/bin/env node
/**
 * Entry point: load configuration, open the data access layer, start the
 * HTTP(S) listener and the operator console, and shut down cleanly when the
 * console exits or the process is signalled.
 */

import fs from "fs";
import http from "http";
import https from "https";
import type { Server as NetServer } from "net";
import type { Readable, Writable } from "stream";
import dotenv from "dotenv";
import pino from "pino";
import type { Logger } from "pino";
import { createApp, type ServiceApp } from "./app";
import { OperatorConsole } from "./cli/console";
import { loadConfig, resolveConfigPath, type Config, type ServerConfig } from "./config";
import { DataAccessLayer } from "./db/dataAccessLayer";
import { createLogger } from "./observability";
import { DEFAULT_API_INFO, type ApiInfo } from "./openapi";
import type { Dispatcher } from "./routing/dispatcher";
import { PUBLIC_API_PREFIX } from "./routing/routeTable";
import type { Express } from "express";

type Server = http.Server | https.Server;

function createServer(app: Express, config: ServerConfig): Server {
  const { ssl } = config;
  if (ssl.enabled && ssl.keyFile !== undefined && ssl.certFile !== undefined) {
    return https.createServer({ key: fs.readFileSync(ssl.keyFile), cert: fs.readFileSync(ssl.certFile) }, app);
  }
  return http.createServer(app);
}

function listen(server: NetServer, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

/** Stops accepting connections and waits for open ones to finish. */
function close(server: NetServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Stops the listener, waits until every routed request has written its
 * response and appended its access record, then closes storage.
 */
export async function shutdown(
  server: Server,
  dispatcher: Dispatcher,
  dataAccessLayer: DataAccessLayer,
  logger: Logger
): Promise<void> {
  const closed = close(server);
  await dispatcher.drain();
  server.closeIdleConnections();
  await closed;
  await dataAccessLayer.close();
  logger.info("Shutdown complete");
}

function waitForShutdown(logger: Logger, operatorConsole: OperatorConsole | null, input: Readable): Promise<string> {
  return new Promise((resolve) => {
    const finish = (reason: string) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(reason);
    };
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      finish(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    if (operatorConsole !== null) {
      operatorConsole.loop(input).then(
        () => finish("console"),
        (error: unknown) => {
          logger.error({ err: error }, "Operator console stopped");
          finish("console");
        }
      );
    }
  });
}

export interface ConsoleStreams {
  input: Readable & { isTTY?: boolean };
  output: Writable;
}

function apiInfoFrom(config: Config): ApiInfo {
  const { contact } = config.docs;
  return contact === undefined ? DEFAULT_API_INFO : { ...DEFAULT_API_INFO, contact };
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  streams: ConsoleStreams = { input: process.stdin, output: process.stdout }
): Promise<number> {
  dotenv.config();

  const bootstrapLogger = pino({ level: process.env.LOG_LEVEL || "info" });

  let config: Config;
  try {
    config = loadConfig(resolveConfigPath(argv));
  } catch (error) {
    bootstrapLogger.fatal({ err: error }, "Failed to load configuration");
    return 1;
  }

  const logger = createLogger(config.log);

  let dataAccessLayer: DataAccessLayer;
  try {
    dataAccessLayer = await DataAccessLayer.open(config.data, logger);
  } catch (error) {
    logger.fatal({ err: error }, "Failed to open the data access layer");
    return 1;
  }

  let service: ServiceApp;
  try {
    service = createApp({
      dataAccessLayer,
      logger,
      enforceSsl: config.server.ssl.enforce,
      collectDefaultMetrics: config.metrics.collectDefaults,
      apiInfo: apiInfoFrom(config),
    });
  } catch (error) {
    logger.fatal({ err: error }, "Failed to register routes");
    await dataAccessLayer.close();
    return 1;
  }

  const server = createServer(service.app, config.server);
  try {
    await listen(server, config.server.host, config.server.port);
  } catch (error) {
    logger.fatal({ err: error }, "Failed to start listener");
    await dataAccessLayer.close();
    return 1;
  }

  const scheme = config.server.ssl.enabled ? "https" : "http";
  logger.info(
    { routes: service.routes.list().map((route) => `${route.verb} ${route.path}`) },
    `Swiss QR service listening on ${scheme}://${config.server.host}:${config.server.port}${PUBLIC_API_PREFIX}`
  );

  const interactive = streams.input.isTTY === true || argv.includes("--console");
  const operatorConsole = interactive ? new OperatorConsole(dataAccessLayer, streams.output, logger) : null;

  const reason = await waitForShutdown(logger, operatorConsole, streams.input);
  logger.info({ reason }, "Stopping listener");

  await shutdown(server, service.dispatcher, dataAccessLayer, logger);
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("Unexpected error during start-up:", error);
      process.exit(1);
    }
  );
}
