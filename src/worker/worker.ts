import type { Server } from "node:http";
import type { WorkerSettings } from "../config";
import { createLogger, type Logger } from "../logger";
import { WorkerAgent } from "./agent";
import { HttpMasterLink, type MasterLink } from "./masterClient";
import { createWorkerServer } from "./server";

export interface WorkerNodeOptions {
  link?: MasterLink;
  workerId?: string;
  onFatal?: (error: Error) => void;
  logger?: Logger;
}

export class WorkerNode {
  readonly settings: WorkerSettings;
  private options: WorkerNodeOptions;
  private logger: Logger;
  private server: Server | null;
  private agent: WorkerAgent | null;

  constructor(settings: WorkerSettings, options: WorkerNodeOptions = {}) {
    this.settings = settings;
    this.options = options;
    this.logger = options.logger ?? createLogger(`worker:${settings.zoneId}`);
    this.server = null;
    this.agent = null;
  }

  get currentAgent(): WorkerAgent | null {
    return this.agent;
  }

  /** Binds the command endpoint, then registers with the master. */
  async start(): Promise<WorkerAgent> {
    const { settings } = this;
    const server = createWorkerServer(() => this.agent, this.logger.child("http"));
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(settings.port, settings.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Worker server did not bind to a TCP port.");
    }
    const agent = new WorkerAgent({
      zoneId: settings.zoneId,
      address: `http://${settings.advertiseHost}:${address.port}`,
      workerId: this.options.workerId ?? `worker_${process.pid}`,
      link: this.options.link ?? new HttpMasterLink(settings.masterUrl, settings.requestTimeoutMs),
      zone: settings.zone,
      registrationAttempts: settings.registrationAttempts,
      retryBaseMs: settings.retryBaseMs,
      idleReregisterMs: settings.idleReregisterMs,
      onFatal: this.options.onFatal,
      logger: this.logger
    });
    this.agent = agent;
    this.logger.info(`listening on port ${address.port}, registering with ${settings.masterUrl}`);
    await agent.connect();
    return agent;
  }

  async close(): Promise<void> {
    this.agent?.stop();
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
