/**
 * Interactive operator console: token administration and a peek at the
 * access log. Runs until `quit`/`exit` or end of input.
 */

import readline from "readline";
import type { Readable, Writable } from "stream";
import type { Logger } from "pino";
import type { DataAccessLayer } from "../db/dataAccessLayer";
import { isPermission, PERMISSIONS, type Permission } from "../models/token";
import { toError } from "../utils/result";

export type CommandOutcome = "continue" | "exit";

const HELP = [
  "Commands:",
  "  token create <permission> [permission...]   issue a token",
  "  token list                                   list active tokens",
  "  token revoke <id>                            revoke a token",
  "  logs [n]                                     show the last n access records (default 10)",
  "  help                                         show this help",
  "  quit | exit                                  stop the service",
  `Permissions: ${PERMISSIONS.join(", ")}`,
].join("\n");

export class OperatorConsole {
  constructor(
    private readonly dataAccessLayer: DataAccessLayer,
    private readonly output: Writable,
    private readonly logger: Logger
  ) {}

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }

  async execute(line: string): Promise<CommandOutcome> {
    const parts = line.trim().split(/\s+/).filter((part) => part !== "");
    if (parts.length === 0) {
      return "continue";
    }
    const [command, ...args] = parts;

    switch (command) {
      case "quit":
      case "exit":
        this.print("Shutting down...");
        return "exit";
      case "help":
        this.print(HELP);
        return "continue";
      case "token":
        await this.token(args);
        return "continue";
      case "logs":
        await this.logs(args);
        return "continue";
      default:
        this.print(`Unknown command "${command}". Type "help" for a list of commands.`);
        return "continue";
    }
  }

  private async token([subcommand, ...args]: string[]): Promise<void> {
    const tokens = this.dataAccessLayer.tokenStore;

    switch (subcommand) {
      case "create": {
        const unknown = args.filter((arg) => !isPermission(arg));
        if (args.length === 0 || unknown.length > 0) {
          this.print(`Usage: token create <permission> [permission...] (known: ${PERMISSIONS.join(", ")})`);
          return;
        }
        const permissions: Permission[] = args.filter(isPermission);
        const token = await tokens.issue(permissions);
        this.logger.info({ tokenId: token.id, permissions }, "Token issued");
        this.print(`Created token ${token.id}`);
        this.print(`Secret: ${token.secret}`);
        return;
      }
      case "list": {
        const list = await tokens.list();
        if (list.length === 0) {
          this.print("No active tokens.");
          return;
        }
        for (const token of list) {
          this.print(`${token.id}  [${[...token.permissions].join(", ")}]  created ${new Date(token.createdAt).toISOString()}`);
        }
        return;
      }
      case "revoke": {
        const [id] = args;
        if (id === undefined) {
          this.print("Usage: token revoke <id>");
          return;
        }
        if (await tokens.revoke(id)) {
          this.logger.info({ tokenId: id }, "Token revoked");
          this.print(`Revoked token ${id}`);
        } else {
          this.print(`No active token with id ${id}`);
        }
        return;
      }
      default:
        this.print("Usage: token create|list|revoke");
    }
  }

  private async logs([count]: string[]): Promise<void> {
    const limit = count === undefined ? 10 : Number(count);
    if (!Number.isInteger(limit) || limit <= 0) {
      this.print("Usage: logs [n] with n a positive integer");
      return;
    }
    const records = await this.dataAccessLayer.accessLogs.recent(limit);
    if (records.length === 0) {
      this.print("No access records.");
      return;
    }
    for (const record of records) {
      this.print(
        `${new Date(record.timestamp).toISOString()}  ${record.method} ${record.path}  ${record.statusCode}  token=${record.tokenId}  from=${record.remoteAddress}`
      );
    }
  }

  /**
   * Reads commands line by line, one at a time, until `quit`/`exit` or the
   * input ends. A failing command is reported and the loop goes on.
   */
  loop(input: Readable): Promise<void> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input, output: this.output, terminal: false });
      let queue: Promise<void> = Promise.resolve();

      this.print('Type "help" for a list of commands.');

      rl.on("line", (line) => {
        queue = queue
          .then(() => this.execute(line))
          .then((outcome) => {
            if (outcome === "exit") {
              rl.close();
            }
          })
          .catch((error: unknown) => {
            this.print(`Command failed: ${toError(error).message}`);
            this.logger.error({ err: error, command: line }, "Console command failed");
          });
      });

      // The queue never rejects: every command has its own catch.
      rl.on("close", () => {
        void queue.then(() => resolve());
      });
    });
  }
}
