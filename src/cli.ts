#!/usr/bin/env tsx
import { parseCommand, USAGE } from "./commands";
import type { MasterSettings, WorkerSettings } from "./config";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import { MasterNode } from "./master/master";
import { WorkerNode } from "./worker/worker";

async function runMaster(settings: MasterSettings): Promise<void> {
  const master = new MasterNode(settings);
  process.once("SIGINT", () => master.stop());
  process.once("SIGTERM", () => master.stop());
  await master.listen();
  await master.run();
}

async function runWorker(settings: WorkerSettings): Promise<void> {
  const logger = createLogger(`worker:${settings.zoneId}`);
  const worker = new WorkerNode(settings, {
    logger,
    onFatal: (error) => {
      logger.error(`giving up: ${error.message}`);
      worker.close().then(
        () => process.exit(1),
        () => process.exit(1)
      );
    }
  });
  const shutdown = () => {
    worker.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  try {
    await worker.start();
  } catch (error) {
    await worker.close();
    throw error;
  }
}

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "master":
      await runMaster(command.settings);
      return;
    case "worker":
      await runWorker(command.settings);
      return;
  }
}

main().catch((error: unknown) => {
  console.error("[cli]", describeError(error));
  process.exit(1);
});
